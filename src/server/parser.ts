import { readFileSync, existsSync } from 'fs';
import type {
  AccessPolicy,
  LogFormat,
  OverridePolicy,
  VirtualHostConfig,
} from '../shared/types.js';
import { ConfigError, errorMessage } from './errors.js';
import { validateVirtualHostConfig } from './validation.js';

interface DirectiveNode {
  kind: 'directive';
  name: string; // sempre em minúsculas
  rawName: string;
  args: string[];
  line: number;
}

interface SectionNode {
  kind: 'section';
  name: string;
  rawName: string;
  args: string[];
  line: number;
  children: ConfigNode[];
}

type ConfigNode = DirectiveNode | SectionNode;

interface LogicalLine {
  text: string;
  line: number;
}

/**
 * Lê e parseia um arquivo de configuração do VirtualHost.
 * Carregamento é tudo-ou-nada: qualquer erro devolve um ConfigError.
 */
export function loadVirtualHostConfig(configPath: string): VirtualHostConfig | ConfigError {
  if (!existsSync(configPath)) {
    return new ConfigError('FILE_NOT_FOUND', `Arquivo de configuração não encontrado: ${configPath}`);
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    return new ConfigError('READ_FAILED', `Falha ao ler ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  return parseVirtualHost(content, configPath);
}

/**
 * Parseia o texto de um bloco <VirtualHost> e devolve o registro validado
 */
export function parseVirtualHost(content: string, source?: string): VirtualHostConfig | ConfigError {
  try {
    const nodes = parseDirectives(content, source);
    const config = interpretVirtualHost(nodes, source);

    const issues = validateVirtualHostConfig(config);
    if (issues.length > 0) {
      return new ConfigError('VALIDATION', issues.map(i => `${i.field}: ${i.message}`).join('; '), {
        source,
        issues,
      });
    }

    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
}

/**
 * Junta linhas terminadas em \ e descarta comentários e linhas vazias.
 * Comentários (#) só valem no início da linha, como no Apache.
 */
function toLogicalLines(content: string): LogicalLine[] {
  const physical = content.split(/\r?\n/);
  const logical: LogicalLine[] = [];

  let current = '';
  let startLine = 0;

  physical.forEach((raw, index) => {
    const lineNumber = index + 1;
    const trimmed = raw.trim();

    if (!current && (!trimmed || trimmed.startsWith('#'))) {
      return;
    }

    if (!current) {
      startLine = lineNumber;
    }

    if (trimmed.endsWith('\\')) {
      // Remove \ e continua na próxima linha
      current += trimmed.slice(0, -1).trim() + ' ';
      return;
    }

    current += trimmed;
    logical.push({ text: current.trim(), line: startLine });
    current = '';
  });

  if (current.trim()) {
    logical.push({ text: current.trim(), line: startLine });
  }

  return logical;
}

/**
 * Separa argumentos respeitando aspas duplas (\" e \\ são escapes)
 */
function splitArguments(text: string, line: number, source?: string): string[] {
  const args: string[] = [];
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (/\s/.test(char)) {
      index++;
      continue;
    }

    if (char === '"') {
      let value = '';
      index++;
      let closed = false;

      while (index < text.length) {
        const current = text[index];
        const next = text[index + 1];

        if (current === '\\' && (next === '"' || next === '\\')) {
          value += next;
          index += 2;
          continue;
        }
        if (current === '"') {
          closed = true;
          index++;
          break;
        }
        value += current;
        index++;
      }

      if (!closed) {
        throw new ConfigError('SYNTAX', 'Aspas não fechadas', { line, source });
      }
      if (index < text.length && !/\s/.test(text[index])) {
        throw new ConfigError('SYNTAX', 'Argumento entre aspas seguido de texto', { line, source });
      }

      args.push(value);
      continue;
    }

    let value = '';
    while (index < text.length && !/\s/.test(text[index])) {
      value += text[index];
      index++;
    }
    args.push(value);
  }

  return args;
}

/**
 * Parseia todas as diretivas e seções aninhadas (<Directory>, etc.)
 * Suporta:
 * - Comentários (#)
 * - Diretivas multi-linha
 * - Tabs e espaços variados
 * - Nomes de diretiva sem diferenciar maiúsculas
 */
function parseDirectives(content: string, source?: string): ConfigNode[] {
  const root: ConfigNode[] = [];
  const stack: SectionNode[] = [];

  const addNode = (node: ConfigNode): void => {
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      root.push(node);
    }
  };

  for (const { text, line } of toLogicalLines(content)) {
    if (text.startsWith('</')) {
      const closeMatch = text.match(/^<\/\s*([A-Za-z]+)\s*>$/);
      if (!closeMatch) {
        throw new ConfigError('SYNTAX', `Fechamento de seção inválido: ${text}`, { line, source });
      }

      const open = stack.pop();
      const closing = closeMatch[1];
      if (!open) {
        throw new ConfigError('SYNTAX', `</${closing}> sem seção aberta`, { line, source });
      }
      if (open.name !== closing.toLowerCase()) {
        throw new ConfigError('SYNTAX', `</${closing}> não fecha <${open.rawName}> (linha ${open.line})`, {
          line,
          source,
        });
      }
      continue;
    }

    if (text.startsWith('<')) {
      const openMatch = text.match(/^<\s*([A-Za-z]+)(?:\s+([^>]*))?>$/);
      if (!openMatch) {
        throw new ConfigError('SYNTAX', `Abertura de seção inválida: ${text}`, { line, source });
      }

      const section: SectionNode = {
        kind: 'section',
        name: openMatch[1].toLowerCase(),
        rawName: openMatch[1],
        args: splitArguments(openMatch[2] ?? '', line, source),
        line,
        children: [],
      };
      addNode(section);
      stack.push(section);
      continue;
    }

    const directiveMatch = text.match(/^([A-Za-z][A-Za-z0-9_-]*)(?:\s+(.*))?$/);
    if (!directiveMatch) {
      throw new ConfigError('SYNTAX', `Linha inválida: ${text}`, { line, source });
    }

    addNode({
      kind: 'directive',
      name: directiveMatch[1].toLowerCase(),
      rawName: directiveMatch[1],
      args: splitArguments(directiveMatch[2] ?? '', line, source),
      line,
    });
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new ConfigError('SYNTAX', `<${unclosed.rawName}> não foi fechada`, { line: unclosed.line, source });
  }

  return root;
}

const VHOST_DIRECTIVES = new Set([
  'servername',
  'documentroot',
  'errorlog',
  'serversignature',
  'customlog',
  'sslengine',
  'sslcertificatefile',
  'sslcertificatekeyfile',
]);

const DIRECTORY_DIRECTIVES = new Set(['options', 'allowoverride', 'require']);

/**
 * Agrupa diretivas por nome, rejeitando desconhecidas e repetidas
 */
function indexDirectives(
  nodes: ConfigNode[],
  allowed: Set<string>,
  repeatable: Set<string>,
  source?: string,
): Map<string, DirectiveNode[]> {
  const directives = new Map<string, DirectiveNode[]>();

  for (const node of nodes) {
    if (node.kind === 'section') {
      continue;
    }
    if (!allowed.has(node.name)) {
      throw new ConfigError('UNKNOWN_DIRECTIVE', `Diretiva não suportada: ${node.rawName}`, {
        line: node.line,
        source,
      });
    }
    addDirective(directives, node, repeatable, source);
  }

  return directives;
}

/**
 * Adiciona uma diretiva ao mapa (apenas as repetíveis aceitam múltiplos valores)
 */
function addDirective(
  map: Map<string, DirectiveNode[]>,
  node: DirectiveNode,
  repeatable: Set<string>,
  source?: string,
): void {
  const existing = map.get(node.name);
  if (!existing) {
    map.set(node.name, [node]);
    return;
  }
  if (!repeatable.has(node.name)) {
    throw new ConfigError(
      'DUPLICATE_DIRECTIVE',
      `${node.rawName} repetida (primeira ocorrência na linha ${existing[0].line})`,
      { line: node.line, source },
    );
  }
  existing.push(node);
}

/**
 * Obtém a primeira ocorrência de uma diretiva obrigatória
 */
function getFirstDirective(
  directives: Map<string, DirectiveNode[]>,
  name: string,
  displayName: string,
  context: { line: number; source?: string },
): DirectiveNode {
  const node = directives.get(name)?.[0];
  if (!node) {
    throw new ConfigError('MISSING_DIRECTIVE', `${displayName} ausente`, context);
  }
  return node;
}

function expectArgs(node: DirectiveNode, count: number, source?: string): string[] {
  if (node.args.length !== count) {
    throw new ConfigError(
      'INVALID_VALUE',
      `${node.rawName} espera ${count} argumento(s), recebeu ${node.args.length}`,
      { line: node.line, source },
    );
  }
  return node.args;
}

function parseFlag(node: DirectiveNode, source?: string): boolean {
  const [value] = expectArgs(node, 1, source);
  switch (value.toLowerCase()) {
    case 'on':
      return true;
    case 'off':
      return false;
    default:
      throw new ConfigError('INVALID_VALUE', `${node.rawName} aceita On ou Off, recebeu ${value}`, {
        line: node.line,
        source,
      });
  }
}

function parseListenAddress(section: SectionNode, source?: string): { host: string; port: number } {
  const context = { line: section.line, source };
  if (section.args.length !== 1) {
    throw new ConfigError('INVALID_VALUE', '<VirtualHost> espera um único endereço host:porta', context);
  }

  const [address] = section.args;
  const separator = address.lastIndexOf(':');
  const host = separator === -1 ? address : address.slice(0, separator);
  const portText = separator === -1 ? '' : address.slice(separator + 1);

  if (!host || !/^\d+$/.test(portText)) {
    throw new ConfigError('INVALID_VALUE', `Endereço inválido: ${address}`, context);
  }

  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    throw new ConfigError('INVALID_VALUE', `Porta fora do range válido: ${port}`, context);
  }

  return { host, port };
}

interface DirectoryOptions {
  allowSymlinks: boolean;
  multiViews: boolean;
  directoryListing: boolean;
}

const KNOWN_OPTIONS: Record<string, string> = {
  indexes: 'Indexes',
  followsymlinks: 'FollowSymLinks',
  multiviews: 'MultiViews',
};

/**
 * Aplica as linhas Options na ordem, como o Apache:
 * sem prefixo substitui o conjunto; +X/-X adiciona ou remove.
 */
function resolveOptions(nodes: DirectiveNode[], source?: string): DirectoryOptions {
  // Padrão do Apache 2.4 quando nenhuma Options é declarada
  let enabled = new Set<string>(['FollowSymLinks']);

  for (const node of nodes) {
    const context = { line: node.line, source };
    if (node.args.length === 0) {
      throw new ConfigError('INVALID_VALUE', 'Options sem argumentos', context);
    }

    const prefixed = node.args.filter(arg => arg.startsWith('+') || arg.startsWith('-'));
    if (prefixed.length > 0 && prefixed.length !== node.args.length) {
      throw new ConfigError('INVALID_VALUE', 'Options não pode misturar valores com e sem +/-', context);
    }

    if (prefixed.length === 0) {
      const next = new Set<string>();
      for (const arg of node.args) {
        const lower = arg.toLowerCase();
        if (lower === 'none') {
          if (node.args.length > 1) {
            throw new ConfigError('INVALID_VALUE', 'Options None não aceita outros valores', context);
          }
          continue;
        }
        if (lower === 'all') {
          next.add('Indexes');
          next.add('FollowSymLinks');
          continue;
        }
        const option = KNOWN_OPTIONS[lower];
        if (!option) {
          throw new ConfigError('INVALID_VALUE', `Option não suportada: ${arg}`, context);
        }
        next.add(option);
      }
      enabled = next;
      continue;
    }

    for (const arg of node.args) {
      const option = KNOWN_OPTIONS[arg.slice(1).toLowerCase()];
      if (!option) {
        throw new ConfigError('INVALID_VALUE', `Option não suportada: ${arg}`, context);
      }
      if (arg.startsWith('+')) {
        enabled.add(option);
      } else {
        enabled.delete(option);
      }
    }
  }

  return {
    allowSymlinks: enabled.has('FollowSymLinks'),
    multiViews: enabled.has('MultiViews'),
    directoryListing: enabled.has('Indexes'),
  };
}

function parseOverridePolicy(node: DirectiveNode, source?: string): OverridePolicy {
  const [value] = expectArgs(node, 1, source);
  switch (value.toLowerCase()) {
    case 'none':
      return 'None';
    case 'all':
      return 'All';
    default:
      throw new ConfigError('INVALID_VALUE', `AllowOverride não suportado: ${value}`, {
        line: node.line,
        source,
      });
  }
}

function parseAccessPolicy(node: DirectiveNode, source?: string): AccessPolicy {
  const policy = expectArgs(node, 2, source).join(' ').toLowerCase();
  if (policy === 'all granted' || policy === 'all denied') {
    return policy;
  }
  throw new ConfigError('INVALID_VALUE', `Require não suportado: ${node.args.join(' ')}`, {
    line: node.line,
    source,
  });
}

function parseCustomLog(node: DirectiveNode, source?: string): { path: string; format: LogFormat } {
  const [path, format] = expectArgs(node, 2, source);
  const lower = format.toLowerCase();
  if (lower !== 'combined' && lower !== 'common') {
    throw new ConfigError('INVALID_VALUE', `Formato de log não suportado: ${format}`, {
      line: node.line,
      source,
    });
  }
  return { path, format: lower };
}

function stripTrailingSlash(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, '') : path;
}

/**
 * Converte a árvore de diretivas no registro VirtualHostConfig
 */
function interpretVirtualHost(nodes: ConfigNode[], source?: string): VirtualHostConfig {
  const vhosts: SectionNode[] = [];

  for (const node of nodes) {
    if (node.kind === 'section' && node.name === 'virtualhost') {
      vhosts.push(node);
      continue;
    }
    throw new ConfigError('UNKNOWN_DIRECTIVE', `${node.rawName} não é suportada fora de <VirtualHost>`, {
      line: node.line,
      source,
    });
  }

  const [vhost, extra] = vhosts;
  if (!vhost) {
    throw new ConfigError('MISSING_DIRECTIVE', 'Nenhum bloco <VirtualHost> encontrado', { source });
  }
  if (extra) {
    throw new ConfigError('DUPLICATE_DIRECTIVE', 'Apenas um bloco <VirtualHost> é suportado', {
      line: extra.line,
      source,
    });
  }

  const listenAddress = parseListenAddress(vhost, source);
  const context = { line: vhost.line, source };

  const sections = vhost.children.filter((child): child is SectionNode => child.kind === 'section');
  for (const section of sections) {
    if (section.name !== 'directory') {
      throw new ConfigError('UNKNOWN_DIRECTIVE', `Seção não suportada: <${section.rawName}>`, {
        line: section.line,
        source,
      });
    }
  }

  const [directory, extraDirectory] = sections;
  if (!directory) {
    throw new ConfigError('MISSING_DIRECTIVE', '<Directory> ausente', context);
  }
  if (extraDirectory) {
    throw new ConfigError('DUPLICATE_DIRECTIVE', 'Apenas uma seção <Directory> é suportada', {
      line: extraDirectory.line,
      source,
    });
  }

  const directives = indexDirectives(vhost.children, VHOST_DIRECTIVES, new Set(), source);

  const serverName = expectArgs(getFirstDirective(directives, 'servername', 'ServerName', context), 1, source)[0];
  const documentRootNode = getFirstDirective(directives, 'documentroot', 'DocumentRoot', context);
  const [documentRoot] = expectArgs(documentRootNode, 1, source);
  const [errorLogPath] = expectArgs(getFirstDirective(directives, 'errorlog', 'ErrorLog', context), 1, source);
  const customLog = parseCustomLog(getFirstDirective(directives, 'customlog', 'CustomLog', context), source);
  const tlsEnabled = parseFlag(getFirstDirective(directives, 'sslengine', 'SSLEngine', context), source);
  const [tlsCertificatePath] = expectArgs(
    getFirstDirective(directives, 'sslcertificatefile', 'SSLCertificateFile', context),
    1,
    source,
  );
  const [tlsPrivateKeyPath] = expectArgs(
    getFirstDirective(directives, 'sslcertificatekeyfile', 'SSLCertificateKeyFile', context),
    1,
    source,
  );

  // ServerSignature é Off por padrão
  const signatureNode = directives.get('serversignature')?.[0];
  const serverSignatureEnabled = signatureNode ? parseFlag(signatureNode, source) : false;

  if (directory.args.length !== 1) {
    throw new ConfigError('INVALID_VALUE', '<Directory> espera um único caminho', {
      line: directory.line,
      source,
    });
  }
  if (stripTrailingSlash(directory.args[0]) !== stripTrailingSlash(documentRoot)) {
    throw new ConfigError(
      'INVALID_VALUE',
      `<Directory> (${directory.args[0]}) deve ser igual ao DocumentRoot (${documentRoot})`,
      { line: directory.line, source },
    );
  }

  const nested = directory.children.find((child): child is SectionNode => child.kind === 'section');
  if (nested) {
    throw new ConfigError('UNKNOWN_DIRECTIVE', `Seção não suportada em <Directory>: <${nested.rawName}>`, {
      line: nested.line,
      source,
    });
  }

  const directoryContext = { line: directory.line, source };
  const directoryDirectives = indexDirectives(
    directory.children,
    DIRECTORY_DIRECTIVES,
    new Set(['options']),
    source,
  );

  const options = resolveOptions(directoryDirectives.get('options') ?? [], source);

  // AllowOverride é None por padrão no Apache 2.4
  const overrideNode = directoryDirectives.get('allowoverride')?.[0];
  const overridePolicy = overrideNode ? parseOverridePolicy(overrideNode, source) : 'None';

  const accessControl = parseAccessPolicy(
    getFirstDirective(directoryDirectives, 'require', 'Require', directoryContext),
    source,
  );

  return Object.freeze({
    listenAddress: Object.freeze(listenAddress),
    serverName,
    documentRoot,
    allowSymlinks: options.allowSymlinks,
    multiViews: options.multiViews,
    directoryListing: options.directoryListing,
    overridePolicy,
    accessControl,
    errorLogPath,
    accessLogPath: customLog.path,
    accessLogFormat: customLog.format,
    serverSignatureEnabled,
    tlsEnabled,
    tlsCertificatePath,
    tlsPrivateKeyPath,
  });
}
