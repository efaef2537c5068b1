/**
 * Operações de arquivo e execução de comandos do sistema
 */

import { writeFileSync, copyFileSync, chmodSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { exec } from 'child_process';
import { promisify } from 'util';
import { logger } from './logger.js';
import { escapeShellArg } from './validation.js';
import { CommandError, errorMessage } from './errors.js';

const execAsync = promisify(exec);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

interface ExecFailure {
  stdout?: unknown;
  stderr?: unknown;
  code?: unknown;
}

function asText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return Buffer.isBuffer(value) ? value.toString('utf-8') : '';
}

function readFailure(error: unknown): ExecFailure {
  return typeof error === 'object' && error !== null ? error : {};
}

/**
 * Executa um comando shell com logging detalhado
 */
export async function execCommand(command: string): Promise<ExecResult> {
  logger.debug('execCommand', `Executando comando: ${command}`);

  try {
    const result = await execAsync(command, { maxBuffer: 1024 * 1024 });
    logger.debug('execCommand', 'Comando executado com sucesso', {
      command,
      stdout: result.stdout.substring(0, 500),
      stderr: result.stderr.substring(0, 500),
    });
    return result;
  } catch (error) {
    const failure = readFailure(error);
    const stdout = asText(failure.stdout);
    const stderr = asText(failure.stderr) || (stdout ? '' : errorMessage(error));
    const exitCode = typeof failure.code === 'number' || typeof failure.code === 'string' ? failure.code : 'unknown';

    logger.error('execCommand', 'Comando falhou', {
      command,
      exitCode,
      stdout: stdout.substring(0, 500),
      stderr: stderr.substring(0, 500),
    });

    throw new CommandError(command, stdout, stderr, exitCode);
  }
}

/**
 * Escreve conteúdo em arquivo protegido (via sudo quando configurado)
 */
export async function writeProtectedFile(filePath: string, content: string, useSudo = true): Promise<void> {
  if (!useSudo) {
    writeFileSync(filePath, content, { encoding: 'utf-8', mode: 0o644 });
    return;
  }

  const tempPath = join(tmpdir(), `vhost-write-${Date.now()}.conf`);

  // Escrever em arquivo temporário
  writeFileSync(tempPath, content, 'utf-8');

  try {
    // Copiar para destino final com sudo
    await execCommand(`sudo cp ${escapeShellArg(tempPath)} ${escapeShellArg(filePath)}`);
    await execCommand(`sudo chmod 644 ${escapeShellArg(filePath)}`);
  } finally {
    // Limpar arquivo temporário
    try {
      rmSync(tempPath, { force: true });
    } catch (error) {
      logger.warn('writeProtectedFile', 'Não foi possível remover arquivo temporário', {
        tempPath,
        error: errorMessage(error),
      });
    }
  }
}

/**
 * Copia um arquivo protegido (backup/restauração)
 */
export async function copyProtectedFile(from: string, to: string, useSudo = true): Promise<void> {
  if (!useSudo) {
    copyFileSync(from, to);
    chmodSync(to, 0o644);
    return;
  }
  await execCommand(`sudo cp ${escapeShellArg(from)} ${escapeShellArg(to)}`);
}

/**
 * Remove um arquivo protegido (candidato rejeitado sem backup)
 */
export async function removeProtectedFile(filePath: string, useSudo = true): Promise<void> {
  if (!useSudo) {
    rmSync(filePath, { force: true });
    return;
  }
  await execCommand(`sudo rm -f ${escapeShellArg(filePath)}`);
}
