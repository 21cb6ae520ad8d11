import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  service?: string;
  job?: string;
  runId?: string;
  emailId?: string;
  externalId?: string;
  responseId?: string;
  documentId?: string;
}

const nodeEnv = process.env['NODE_ENV'] ?? 'development';
const isDevelopment = nodeEnv === 'development';

const loggerOptions: pino.LoggerOptions = {
  // Tests stay quiet unless LOG_LEVEL asks otherwise
  level: process.env['LOG_LEVEL'] ?? (nodeEnv === 'test' ? 'silent' : 'info'),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: process.env['SERVICE_NAME'] ?? 'mailpilot',
    version: process.env['APP_VERSION'] ?? '1.0.0',
  },
};

if (isDevelopment) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export const logger: Logger = baseLogger;

export function createLogger(context: LogContext): Logger {
  return baseLogger.child(context);
}

// Utility to measure and log duration
export async function withTiming<T>(
  log: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = performance.now();
  try {
    const result = await fn();
    const durationMs = Math.round(performance.now() - startTime);
    log.info({ operation, durationMs }, `${operation} completed`);
    return result;
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);
    log.error({ operation, durationMs, error }, `${operation} failed`);
    throw error;
  }
}
