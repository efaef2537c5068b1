// Tipos compartilhados entre o renderizador, o parser e o servidor

export type OverridePolicy = 'None' | 'All';

export type AccessPolicy = 'all granted' | 'all denied';

export type LogFormat = 'combined' | 'common';

export interface ListenAddress {
  host: string; // '*' = todas as interfaces
  port: number;
}

/**
 * Registro imutável de um VirtualHost TLS.
 * Construído uma vez na inicialização (ou reload) e nunca alterado depois.
 */
export interface VirtualHostConfig {
  readonly listenAddress: Readonly<ListenAddress>;
  readonly serverName: string;
  readonly documentRoot: string;
  readonly allowSymlinks: boolean;
  readonly multiViews: boolean;
  readonly directoryListing: boolean;
  readonly overridePolicy: OverridePolicy;
  readonly accessControl: AccessPolicy;
  readonly errorLogPath: string;
  readonly accessLogPath: string;
  readonly accessLogFormat: LogFormat;
  readonly serverSignatureEnabled: boolean;
  readonly tlsEnabled: boolean;
  readonly tlsCertificatePath: string;
  readonly tlsPrivateKeyPath: string;
}

/**
 * Valores substituídos no template pelo gerenciador de configuração externo
 */
export interface TemplateValues {
  serverName: string;
  documentRoot: string;
  errorLogPath: string;
  accessLogPath: string;
  tlsCertificatePath: string;
  tlsPrivateKeyPath: string;
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export type ConfigErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_FAILED'
  | 'SYNTAX'
  | 'UNKNOWN_DIRECTIVE'
  | 'MISSING_DIRECTIVE'
  | 'DUPLICATE_DIRECTIVE'
  | 'INVALID_VALUE'
  | 'VALIDATION'
  | 'ENVIRONMENT'
  | 'SETTINGS';

export interface InstallResult {
  changed: boolean;
  message: string;
  validationOutput: string;
  backupPath?: string;
}
