import type { VirtualHostConfig } from '../shared/types.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { loadVirtualHostConfig } from './parser.js';
import { applyVirtualHost, nodeRuntime, type AppliedVirtualHost, type ServerRuntime } from './runtime.js';
import { assertEnvironment } from './services/system.js';

/**
 * Carrega o arquivo ou lança o ConfigError devolvido pelo parser
 */
export function loadOrThrow(configPath: string): VirtualHostConfig {
  const loaded = loadVirtualHostConfig(configPath);
  if (loaded instanceof ConfigError) {
    throw loaded;
  }
  return loaded;
}

/**
 * Sequência de inicialização: carregar, verificar o ambiente, aplicar.
 * Qualquer falha é fatal; não há retry.
 */
export async function startVirtualHost(
  configPath: string,
  runtime: ServerRuntime = nodeRuntime,
): Promise<AppliedVirtualHost> {
  logger.info('startVirtualHost', `Carregando ${configPath}`);

  const config = loadOrThrow(configPath);
  const status = assertEnvironment(config);

  logger.info('startVirtualHost', 'Ambiente verificado', {
    serverName: config.serverName,
    documentRoot: status.documentRoot.path,
    certificate: status.tls.certificate.path,
  });

  return applyVirtualHost(config, runtime);
}
