import { z } from 'zod';

export const DatabaseConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.coerce.number().int().positive().default(5432),
  database: z.string().default('surface_risk'),
  user: z.string().default('postgres'),
  password: z.string().default(''),
  max: z.coerce.number().int().positive().default(20),
  idleTimeoutMillis: z.coerce.number().int().nonnegative().default(30000),
  connectionTimeoutMillis: z.coerce.number().int().nonnegative().default(10000),
}).default({});

const ProbeLimitsSchema = (timeout: number, maxConcurrent: number) =>
  z.object({
    timeout: z.coerce.number().int().positive().default(timeout),
    maxConcurrent: z.coerce.number().int().positive().default(maxConcurrent),
  }).default({});

export const ProbeConfigSchema = z.object({
  ports: ProbeLimitsSchema(3000, 100),
  tls: ProbeLimitsSchema(8000, 20),
  http: ProbeLimitsSchema(10000, 30),
  dns: ProbeLimitsSchema(5000, 50),
  breach: ProbeLimitsSchema(10000, 2),
  userAgent: z.string().default('Mozilla/5.0 (compatible; surface-risk/0.1)'),
  proxyUrl: z.string().url().optional(),
}).default({});

export const BreachServiceConfigSchema = z.object({
  apiUrl: z.string().url().default('https://haveibeenpwned.com/api/v3/breaches'),
  apiKey: z.string().min(1).optional(),
}).default({});

export const EngineConfigSchema = z.object({
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),
  logDir: z.string().optional(),
  database: DatabaseConfigSchema,
  probes: ProbeConfigSchema,
  breach: BreachServiceConfigSchema,
  modelDir: z.string().optional(),
  detectorTimeout: z.coerce.number().int().positive().default(30000),
  maxConcurrentAssets: z.coerce.number().int().positive().default(10),
  maxConcurrentScans: z.coerce.number().int().positive().default(2),
  maxSubdomains: z.coerce.number().int().nonnegative().default(50),
  discoveryAttempts: z.coerce.number().int().positive().default(2),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type ProbeConfig = z.infer<typeof ProbeConfigSchema>;
export type BreachServiceConfig = z.infer<typeof BreachServiceConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
