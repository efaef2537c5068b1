import { z } from 'zod';
import type { TemplateValues } from '../shared/types.js';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const settingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  VHOST_CONFIG_PATH: z.string().min(1).default('/etc/httpd/conf.d/ssl-vhost.conf'),
  VHOST_SERVER_NAME: z.string().min(1).optional(),
  VHOST_DOCUMENT_ROOT: z.string().min(1).default('/var/www/html'),
  VHOST_CERT_FILE: z.string().min(1).default('/etc/grid-security/hostcert.pem'),
  VHOST_KEY_FILE: z.string().min(1).default('/etc/grid-security/hostkey.pem'),
  VHOST_ERROR_LOG: z.string().min(1).default('/var/log/httpd/ssl_error_log'),
  VHOST_ACCESS_LOG: z.string().min(1).default('/var/log/httpd/ssl_access_log'),
  APACHECTL_BIN: z.string().min(1).default('apachectl'),
  RELOAD_COMMAND: z.string().min(1).default('sudo systemctl reload httpd'),
  USE_SUDO: booleanFlag.default('true'),
});

export interface Settings {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
  readonly vhostConfigPath: string;
  readonly apachectl: string;
  readonly reloadCommand: string;
  readonly useSudo: boolean;
  /** Valores padrão do template; serverName não tem padrão */
  readonly template: Omit<TemplateValues, 'serverName'> & { serverName?: string };
}

/**
 * Lê as configurações do ambiente (.env já carregado por dotenv)
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      'SETTINGS',
      `Variáveis de ambiente inválidas: ${issues.map(i => `${i.field} (${i.message})`).join(', ')}`,
      { issues },
    );
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    vhostConfigPath: parsed.VHOST_CONFIG_PATH,
    apachectl: parsed.APACHECTL_BIN,
    reloadCommand: parsed.RELOAD_COMMAND,
    useSudo: parsed.USE_SUDO,
    template: {
      serverName: parsed.VHOST_SERVER_NAME,
      documentRoot: parsed.VHOST_DOCUMENT_ROOT,
      errorLogPath: parsed.VHOST_ERROR_LOG,
      accessLogPath: parsed.VHOST_ACCESS_LOG,
      tlsCertificatePath: parsed.VHOST_CERT_FILE,
      tlsPrivateKeyPath: parsed.VHOST_KEY_FILE,
    },
  };
}

/**
 * Completa os valores do template com os padrões do ambiente
 */
export function resolveTemplateValues(settings: Settings, overrides: Partial<TemplateValues>): TemplateValues {
  const serverName = overrides.serverName ?? settings.template.serverName;
  if (!serverName) {
    throw new ConfigError('SETTINGS', 'ServerName não informado (use --server-name ou VHOST_SERVER_NAME)');
  }

  return {
    serverName,
    documentRoot: overrides.documentRoot ?? settings.template.documentRoot,
    errorLogPath: overrides.errorLogPath ?? settings.template.errorLogPath,
    accessLogPath: overrides.accessLogPath ?? settings.template.accessLogPath,
    tlsCertificatePath: overrides.tlsCertificatePath ?? settings.template.tlsCertificatePath,
    tlsPrivateKeyPath: overrides.tlsPrivateKeyPath ?? settings.template.tlsPrivateKeyPath,
  };
}
