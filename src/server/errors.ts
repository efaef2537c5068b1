import type { ConfigErrorCode, ValidationIssue } from '../shared/types.js';

interface ConfigErrorOptions {
  line?: number;
  source?: string;
  issues?: ValidationIssue[];
  cause?: unknown;
}

/**
 * Falha de configuração ou de inicialização. Sempre fatal para o (re)start.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly line?: number;
  readonly source?: string;
  readonly issues: ValidationIssue[];

  constructor(code: ConfigErrorCode, message: string, options: ConfigErrorOptions = {}) {
    super(formatMessage(message, options), { cause: options.cause });
    this.name = 'ConfigError';
    this.code = code;
    this.line = options.line;
    this.source = options.source;
    this.issues = options.issues ?? [];
  }
}

function formatMessage(message: string, { line, source }: ConfigErrorOptions): string {
  if (line === undefined) {
    return source ? `${source}: ${message}` : message;
  }
  return `${source ?? '<config>'}:${line}: ${message}`;
}

/**
 * Comando shell que terminou com erro
 */
export class CommandError extends Error {
  readonly command: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | string;

  constructor(command: string, stdout: string, stderr: string, exitCode: number | string) {
    const messageParts = [
      `Comando falhou: ${command}`,
      `Exit code: ${exitCode}`,
      stdout.trim() ? `STDOUT:\n${stdout.trim()}` : null,
      stderr.trim() ? `STDERR:\n${stderr.trim()}` : null,
    ].filter((part): part is string => part !== null);

    super(messageParts.join('\n\n'));
    this.name = 'CommandError';
    this.command = command;
    this.stdout = stdout;
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}

export function isConfigError(value: unknown): value is ConfigError {
  return value instanceof ConfigError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
