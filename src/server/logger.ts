/**
 * Logger da aplicação usando pino
 * Mantém a API por operação: logger.info(operation, message, data)
 */
import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export type BaseLogger = pino.Logger;

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

// Campos sensíveis nunca vão para o log
const REDACT_PATHS = ['password', 'token', 'secret', 'key', '*.password', '*.token', '*.secret', '*.key'];

export function createBaseLogger({ level, pretty }: LoggerOptions): BaseLogger {
  return pino({
    level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

function envLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return level === 'debug' || level === 'warn' || level === 'error' ? level : 'info';
}

const nodeEnv = process.env.NODE_ENV;

export const internalLogger = createBaseLogger({
  level: envLevel(),
  pretty: nodeEnv !== 'production' && nodeEnv !== 'test',
});

/**
 * Logger com API por operação
 */
export const logger = {
  debug(operation: string, message: string, data?: LogData): void {
    internalLogger.debug({ operation, ...data }, message);
  },

  info(operation: string, message: string, data?: LogData): void {
    internalLogger.info({ operation, ...data }, message);
  },

  warn(operation: string, message: string, data?: LogData): void {
    internalLogger.warn({ operation, ...data }, message);
  },

  error(operation: string, message: string, data?: LogData): void {
    internalLogger.error({ operation, ...data }, message);
  },

  /**
   * Log de operações que modificam arquivos - MUITO IMPORTANTE
   */
  fileOperation(operation: string, filePath: string, before: string, after: string): void {
    internalLogger.info(
      {
        operation,
        filePath,
        beforeLength: before.length,
        afterLength: after.length,
        diff: {
          removed: before.length - after.length,
          beforePreview: preview(before),
          afterPreview: preview(after),
        },
      },
      `Modificando arquivo: ${filePath}`,
    );
  },
};

function preview(content: string): string {
  return content.length > 500 ? content.substring(0, 500) + '...' : content;
}

export interface ErrorLogHandle {
  logger: BaseLogger;
  close(): void;
}

/**
 * ErrorLog do VirtualHost: linhas JSON anexadas ao arquivo configurado.
 * Abre o arquivo na hora; lança se não puder abrir.
 */
export function createErrorLog(filePath: string): ErrorLogHandle {
  const destination = pino.destination({
    dest: filePath,
    append: true,
    sync: true,
  });
  return {
    logger: pino({ level: 'info', base: { pid: process.pid } }, destination),
    close: () => destination.end(),
  };
}
