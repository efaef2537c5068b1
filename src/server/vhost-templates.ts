/**
 * Gerador do template de configuração VirtualHost TLS do Apache
 */
import type { TemplateValues, VirtualHostConfig } from '../shared/types.js';
import { ConfigError } from './errors.js';

/**
 * Valores fixos do VirtualHost; apenas os valores de TemplateValues variam
 */
export const FIXED_POLICY = {
  listenAddress: { host: '*', port: 443 },
  allowSymlinks: true,
  multiViews: true,
  directoryListing: false,
  overridePolicy: 'None',
  accessControl: 'all granted',
  accessLogFormat: 'combined',
  serverSignatureEnabled: false,
  tlsEnabled: true,
} as const satisfies Omit<VirtualHostConfig, keyof TemplateValues>;

/**
 * Monta o registro a partir dos valores substituídos no template
 */
export function buildVirtualHostConfig(values: TemplateValues): VirtualHostConfig {
  return Object.freeze({
    ...FIXED_POLICY,
    listenAddress: Object.freeze({ ...FIXED_POLICY.listenAddress }),
    serverName: values.serverName,
    documentRoot: values.documentRoot,
    errorLogPath: values.errorLogPath,
    accessLogPath: values.accessLogPath,
    tlsCertificatePath: values.tlsCertificatePath,
    tlsPrivateKeyPath: values.tlsPrivateKeyPath,
  });
}

/**
 * Gera o bloco <VirtualHost> exatamente como o Apache espera lê-lo
 */
export function renderVirtualHost(config: VirtualHostConfig): string {
  assertRenderable(config);

  const { host, port } = config.listenAddress;
  const options = [
    config.allowSymlinks ? 'FollowSymLinks' : null,
    config.multiViews ? 'MultiViews' : null,
  ].filter((option): option is string => option !== null);

  const lines = [
    `<VirtualHost ${host}:${port}>`,
    `  ServerName ${config.serverName}`,
    `  DocumentRoot ${quote(config.documentRoot)}`,
    `  <Directory ${quote(config.documentRoot)}>`,
    `    Options ${options.length > 0 ? options.join(' ') : 'None'}`,
    `    Options ${config.directoryListing ? '+' : '-'}Indexes`,
    `    AllowOverride ${config.overridePolicy}`,
    `    Require ${config.accessControl}`,
    '  </Directory>',
    `  ErrorLog ${quote(config.errorLogPath)}`,
    `  ServerSignature ${config.serverSignatureEnabled ? 'On' : 'Off'}`,
    `  CustomLog ${quote(config.accessLogPath)} ${config.accessLogFormat}`,
    `  SSLEngine ${config.tlsEnabled ? 'on' : 'off'}`,
    `  SSLCertificateFile ${quote(config.tlsCertificatePath)}`,
    `  SSLCertificateKeyFile ${quote(config.tlsPrivateKeyPath)}`,
    '</VirtualHost>',
  ];

  return lines.join('\n') + '\n';
}

function quote(value: string): string {
  return `"${value}"`;
}

/**
 * Aspas, barra invertida, '>' ou quebras de linha não voltariam iguais na leitura do arquivo gerado
 */
function assertRenderable(config: VirtualHostConfig): void {
  const values: Array<[string, string]> = [
    ['serverName', config.serverName],
    ['documentRoot', config.documentRoot],
    ['errorLogPath', config.errorLogPath],
    ['accessLogPath', config.accessLogPath],
    ['tlsCertificatePath', config.tlsCertificatePath],
    ['tlsPrivateKeyPath', config.tlsPrivateKeyPath],
  ];

  const issues = values
    .filter(([, value]) => value.length === 0 || /["\\>\r\n]/.test(value))
    .map(([field, value]) => ({
      field,
      message: value.length === 0 ? 'Valor vazio' : 'Valor contém aspas, \\, > ou quebra de linha',
    }));

  if (config.serverName.length > 0 && /\s/.test(config.serverName)) {
    issues.push({ field: 'serverName', message: 'ServerName não pode conter espaços' });
  }

  if (issues.length > 0) {
    throw new ConfigError('VALIDATION', 'Configuração não pode ser renderizada', { issues });
  }
}
