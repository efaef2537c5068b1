import { readFileSync, existsSync } from 'fs';
import type { InstallResult, VirtualHostConfig } from '../shared/types.js';
import type { Settings } from './config.js';
import { CommandError, ConfigError, errorMessage } from './errors.js';
import { copyProtectedFile, execCommand, removeProtectedFile, writeProtectedFile } from './file-operations.js';
import { logger } from './logger.js';
import { validateVirtualHostConfig } from './validation.js';
import { renderVirtualHost } from './vhost-templates.js';

type ApacheSettings = Pick<Settings, 'vhostConfigPath' | 'apachectl' | 'reloadCommand' | 'useSudo'>;

/**
 * Roda apachectl configtest e devolve a saída combinada.
 * configtest pode sair com código != 0 mesmo com warnings: vale o "Syntax OK".
 */
export async function testConfiguration(settings: Pick<Settings, 'apachectl'>): Promise<{ valid: boolean; output: string }> {
  let output: string;

  try {
    const result = await execCommand(`${settings.apachectl} configtest 2>&1`);
    output = result.stdout + result.stderr;
  } catch (error) {
    if (!(error instanceof CommandError)) {
      throw error;
    }
    output = error.stdout + error.stderr;
  }

  logger.debug('testConfiguration', 'apachectl configtest output', { output });
  return { valid: output.includes('Syntax OK'), output };
}

/**
 * Recarrega o Apache
 */
export async function reloadServer(settings: Pick<Settings, 'reloadCommand'>): Promise<void> {
  await execCommand(settings.reloadCommand);
  logger.info('reloadServer', 'Apache recarregado');
}

/**
 * Renderiza o VirtualHost e instala no conf.d com validação e rollback
 */
export async function installVirtualHost(config: VirtualHostConfig, settings: ApacheSettings): Promise<InstallResult> {
  const filePath = settings.vhostConfigPath;
  logger.info('installVirtualHost', 'Iniciando instalação do VirtualHost', {
    serverName: config.serverName,
    filePath,
  });

  const issues = validateVirtualHostConfig(config);
  if (issues.length > 0) {
    logger.error('installVirtualHost', 'Configuração inválida', { issues });
    throw new ConfigError('VALIDATION', issues.map(i => `${i.field}: ${i.message}`).join('; '), { issues });
  }

  const content = renderVirtualHost(config);
  let previousContent: string | null = null;

  // Se o arquivo atual já existe, compara conteúdo para evitar trabalho desnecessário
  if (existsSync(filePath)) {
    previousContent = readFileSync(filePath, 'utf-8');

    if (previousContent.replace(/\r\n/g, '\n') === content) {
      logger.info('installVirtualHost', 'Instalação ignorada: conteúdo idêntico ao arquivo existente', { filePath });
      return {
        changed: false,
        message: 'Nenhuma alteração detectada; arquivo mantido como está.',
        validationOutput: '',
      };
    }
  }

  // Backup do arquivo atual
  const backupPath = previousContent !== null ? `${filePath}.backup.${Date.now()}` : undefined;
  if (backupPath) {
    await copyProtectedFile(filePath, backupPath, settings.useSudo);
    logger.info('installVirtualHost', `Backup criado: ${backupPath}`);
  }

  // Sem backup o arquivo não existia antes: remover o candidato rejeitado
  const restoreBackup = async (reason: string): Promise<void> => {
    try {
      if (backupPath) {
        await copyProtectedFile(backupPath, filePath, settings.useSudo);
        logger.info('installVirtualHost', `Backup restaurado: ${reason}`);
      } else {
        await removeProtectedFile(filePath, settings.useSudo);
        logger.info('installVirtualHost', `Arquivo novo removido: ${reason}`);
      }
    } catch (restoreError) {
      logger.error('installVirtualHost', 'Erro ao restaurar backup', { error: errorMessage(restoreError) });
    }
  };

  logger.fileOperation('installVirtualHost', filePath, previousContent ?? '', content);
  await writeProtectedFile(filePath, content, settings.useSudo);

  // Validar configuração com apachectl configtest
  const { valid, output } = await testConfiguration(settings);

  if (!valid) {
    // Salvar arquivo com erro para inspeção
    const errorPath = `${filePath}.error`;
    try {
      await copyProtectedFile(filePath, errorPath, settings.useSudo);
      logger.warn('installVirtualHost', `Arquivo com erro salvo em: ${errorPath}`);
    } catch (saveError) {
      logger.error('installVirtualHost', 'Erro ao salvar arquivo com erro', { error: errorMessage(saveError) });
    }

    await restoreBackup('erro de validação');
    logger.error('installVirtualHost', 'Validação falhou', { validationOutput: output, errorPath });
    throw new Error(`Validação falhou: ${output}\n\nArquivo com erro salvo em: ${errorPath}`);
  }

  try {
    await reloadServer(settings);
  } catch (error) {
    await restoreBackup('erro no reload');
    if (backupPath) {
      try {
        // tentar recarregar com o backup
        await reloadServer(settings);
      } catch (reloadError) {
        logger.error('installVirtualHost', 'Reload com backup também falhou', { error: errorMessage(reloadError) });
      }
    }
    logger.error('installVirtualHost', 'Falha ao recarregar Apache', { error: errorMessage(error) });
    throw new Error(`Falha ao recarregar Apache: ${errorMessage(error)}`, { cause: error });
  }

  logger.info('installVirtualHost', `VirtualHost instalado com sucesso: ${config.serverName}`);
  return {
    changed: true,
    message: 'Arquivo instalado e Apache recarregado com sucesso',
    validationOutput: output,
    backupPath,
  };
}
