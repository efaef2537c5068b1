/**
 * Funções de validação e sanitização para a configuração do VirtualHost
 */
import type { ValidationIssue, VirtualHostConfig } from '../shared/types.js';
import { FIXED_POLICY } from './vhost-templates.js';

/**
 * Valida um nome de domínio
 */
export function validateDomain(domain: string): boolean {
  if (domain.length > 253) {
    return false;
  }
  const domainRegex = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z0-9][a-z0-9-]{0,61}[a-z0-9]$/i;
  return domainRegex.test(domain);
}

/**
 * Valida um caminho usado dentro de uma diretiva entre aspas
 * - Deve ser caminho absoluto
 * - Não pode conter aspas, barra invertida, '>', quebras de linha nem caracteres de controle
 * - Não pode conter path traversal (..)
 */
export function validateConfigPath(path: string): boolean {
  if (!path.startsWith('/')) {
    return false;
  }

  if (/["\\>\x00-\x1f\x7f]/.test(path)) {
    return false;
  }

  return !path.split('/').includes('..');
}

// Diretórios proibidos como DocumentRoot (sistema sensível)
const FORBIDDEN_DOCUMENT_ROOTS = [
  '/etc',
  '/root',
  '/sys',
  '/proc',
  '/dev',
  '/boot',
  '/bin',
  '/sbin',
  '/usr/bin',
  '/usr/sbin',
];

/**
 * Valida um caminho de diretório (documentRoot)
 * - Mesmas regras de validateConfigPath
 * - Não pode servir diretórios sensíveis do sistema
 */
export function validateDocumentRoot(path: string): boolean {
  if (!validateConfigPath(path)) {
    return false;
  }

  const normalized = path.length > 1 ? path.replace(/\/+$/, '') : path;
  if (normalized === '/') {
    return false;
  }

  for (const forbidden of FORBIDDEN_DOCUMENT_ROOTS) {
    if (normalized === forbidden || normalized.startsWith(forbidden + '/')) {
      return false;
    }
  }

  return true;
}

const PATH_FIELDS = [
  'errorLogPath',
  'accessLogPath',
  'tlsCertificatePath',
  'tlsPrivateKeyPath',
] as const;

/**
 * Retorna todos os problemas encontrados no registro (lista vazia = válido)
 */
export function validateVirtualHostConfig(config: VirtualHostConfig): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (!config.serverName) {
    issues.push({ field: 'serverName', message: 'ServerName é obrigatório' });
  } else if (!validateDomain(config.serverName)) {
    issues.push({ field: 'serverName', message: `ServerName inválido: ${config.serverName}` });
  }

  if (!validateDocumentRoot(config.documentRoot)) {
    issues.push({
      field: 'documentRoot',
      message: 'DocumentRoot inválido: deve ser um caminho absoluto, sem aspas, \\ ou >, e não pode servir diretórios sensíveis do sistema',
    });
  }

  for (const field of PATH_FIELDS) {
    if (!validateConfigPath(config[field])) {
      issues.push({ field, message: `Caminho inválido: ${JSON.stringify(config[field])}` });
    }
  }

  const { host, port } = config.listenAddress;
  if (host !== FIXED_POLICY.listenAddress.host || port !== FIXED_POLICY.listenAddress.port) {
    issues.push({ field: 'listenAddress', message: `Endereço deve ser *:443, recebido ${host}:${port}` });
  }

  const fixedFields = [
    'directoryListing',
    'overridePolicy',
    'accessControl',
    'accessLogFormat',
    'serverSignatureEnabled',
    'tlsEnabled',
  ] as const;

  for (const field of fixedFields) {
    if (config[field] !== FIXED_POLICY[field]) {
      issues.push({
        field,
        message: `Valor fixo esperado ${JSON.stringify(FIXED_POLICY[field])}, recebido ${JSON.stringify(config[field])}`,
      });
    }
  }

  return issues;
}

/**
 * Escapa caracteres especiais para uso seguro em comandos shell
 */
export function escapeShellArg(arg: string): string {
  // Envolve em aspas simples e escapa aspas simples existentes
  return `'${arg.replace(/'/g, "'\\''")}'`;
}
