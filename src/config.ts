import { EngineConfigSchema, type EngineConfig } from './schemas/config.js';

type Env = Record<string, string | undefined>;

function pick(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function probeLimits(env: Env, prefix: string): { timeout: string | undefined; maxConcurrent: string | undefined } {
  return {
    timeout: pick(env, `${prefix}_PROBE_TIMEOUT`),
    maxConcurrent: pick(env, `${prefix}_PROBE_CONCURRENCY`),
  };
}

/**
 * Builds the engine configuration from environment variables. Anything unset
 * falls back to the schema default; anything malformed aborts startup.
 */
export function loadConfig(env: Env = process.env): EngineConfig {
  const result = EngineConfigSchema.safeParse({
    logLevel: pick(env, 'LOG_LEVEL'),
    logDir: pick(env, 'LOG_DIR'),
    database: {
      host: pick(env, 'DB_HOST'),
      port: pick(env, 'DB_PORT'),
      database: pick(env, 'DB_NAME'),
      user: pick(env, 'DB_USER') ?? pick(env, 'USER'),
      password: pick(env, 'DB_PASSWORD'),
    },
    probes: {
      ports: probeLimits(env, 'PORT'),
      tls: probeLimits(env, 'TLS'),
      http: probeLimits(env, 'HTTP'),
      dns: probeLimits(env, 'DNS'),
      breach: probeLimits(env, 'BREACH'),
      userAgent: pick(env, 'PROBE_USER_AGENT'),
      proxyUrl: pick(env, 'PROBE_PROXY_URL'),
    },
    breach: {
      apiUrl: pick(env, 'BREACH_API_URL'),
      apiKey: pick(env, 'BREACH_API_KEY'),
    },
    modelDir: pick(env, 'MODEL_DIR'),
    detectorTimeout: pick(env, 'DETECTOR_TIMEOUT'),
    maxConcurrentAssets: pick(env, 'MAX_CONCURRENT_ASSETS'),
    maxConcurrentScans: pick(env, 'MAX_CONCURRENT_SCANS'),
    maxSubdomains: pick(env, 'MAX_SUBDOMAINS'),
    discoveryAttempts: pick(env, 'DISCOVERY_ATTEMPTS'),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
