import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string | undefined;
}

function buildTransports(logFile: string | undefined): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = process.env['LOG_LEVEL'] ?? 'info', name, logFile } = options;

  return winston.createLogger({
    level: level === 'silent' ? 'info' : level,
    silent: level === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports: buildTransports(logFile),
  });
}

export function createScanLogger(scanId: string, options: { level?: string; logDir?: string | undefined } = {}): winston.Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';

  return winston.createLogger({
    level: level === 'silent' ? 'info' : level,
    silent: level === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, asset, error }) => {
        const assetTag = asset ? ` [${String(asset)}]` : '';
        const errorTag = error ? ` ERROR: ${String(error)}` : '';
        return `${timestamp} ${level.toUpperCase()} [scan ${scanId.substring(0, 8)}]${assetTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { scanId },
    transports: buildTransports(options.logDir ? `${options.logDir}/scan-${scanId}.log` : undefined),
  });
}
