#!/usr/bin/env node
import 'dotenv/config';
import { realpathSync, writeFileSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import type { TemplateValues } from '../shared/types.js';
import { loadSettings, resolveTemplateValues } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { installVirtualHost } from './manager.js';
import { loadVirtualHostConfig } from './parser.js';
import { startVirtualHost } from './bootstrap.js';
import { checkEnvironment, environmentIssues } from './services/system.js';
import { buildVirtualHostConfig, renderVirtualHost } from './vhost-templates.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  exit: (code: number) => void;
}

const defaultIO: CliIO = {
  out: text => process.stdout.write(text),
  err: text => process.stderr.write(text),
  exit: code => {
    process.exitCode = code;
  },
};

interface TemplateFlags {
  serverName?: string;
  documentRoot?: string;
  cert?: string;
  key?: string;
  errorLog?: string;
  accessLog?: string;
}

function templateOverrides(flags: TemplateFlags): Partial<TemplateValues> {
  return {
    serverName: flags.serverName,
    documentRoot: flags.documentRoot,
    tlsCertificatePath: flags.cert,
    tlsPrivateKeyPath: flags.key,
    errorLogPath: flags.errorLog,
    accessLogPath: flags.accessLog,
  };
}

function withTemplateOptions(command: Command): Command {
  return command
    .option('--server-name <hostname>', 'ServerName (padrão: VHOST_SERVER_NAME)')
    .option('--document-root <path>', 'DocumentRoot (padrão: VHOST_DOCUMENT_ROOT)')
    .option('--cert <path>', 'SSLCertificateFile (padrão: VHOST_CERT_FILE)')
    .option('--key <path>', 'SSLCertificateKeyFile (padrão: VHOST_KEY_FILE)')
    .option('--error-log <path>', 'ErrorLog (padrão: VHOST_ERROR_LOG)')
    .option('--access-log <path>', 'CustomLog (padrão: VHOST_ACCESS_LOG)');
}

function reportError(io: CliIO, error: unknown): void {
  if (error instanceof ConfigError) {
    io.err(`Erro [${error.code}]: ${error.message}\n`);
    for (const issue of error.issues) {
      io.err(`  - ${issue.field}: ${issue.message}\n`);
    }
  } else {
    io.err(`Erro: ${errorMessage(error)}\n`);
  }
  io.exit(1);
}

export function createProgram(io: CliIO = defaultIO, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('ssl-vhost')
    .description('Gera, valida, instala e serve um VirtualHost TLS do Apache')
    .version('1.0.0');

  withTemplateOptions(program.command('render'))
    .description('Renderiza o bloco <VirtualHost *:443>')
    .option('-o, --output <file>', 'Escreve em arquivo em vez de stdout')
    .action((flags: TemplateFlags & { output?: string }) => {
      try {
        const settings = loadSettings(env);
        const config = buildVirtualHostConfig(resolveTemplateValues(settings, templateOverrides(flags)));
        const content = renderVirtualHost(config);

        if (flags.output) {
          writeFileSync(flags.output, content, 'utf-8');
          logger.info('render', `Configuração escrita em ${flags.output}`);
        } else {
          io.out(content);
        }
      } catch (error) {
        reportError(io, error);
      }
    });

  program
    .command('check')
    .description('Valida um arquivo de VirtualHost')
    .argument('<file>', 'Arquivo de configuração')
    .option('--preflight', 'Verifica também certificado, chave, DocumentRoot e logs')
    .action((file: string, flags: { preflight?: boolean }) => {
      const loaded = loadVirtualHostConfig(file);
      if (loaded instanceof ConfigError) {
        reportError(io, loaded);
        return;
      }

      if (flags.preflight) {
        const issues = environmentIssues(checkEnvironment(loaded));
        if (issues.length > 0) {
          reportError(io, new ConfigError('ENVIRONMENT', `Ambiente inválido para ${loaded.serverName}`, { issues }));
          return;
        }
      }

      io.out(`OK ${loaded.serverName}\n`);
    });

  program
    .command('serve')
    .description('Sobe o servidor HTTPS estático descrito pelo arquivo')
    .argument('[file]', 'Arquivo de configuração (padrão: VHOST_CONFIG_PATH)')
    .action(async (file: string | undefined) => {
      try {
        const configPath = file ?? loadSettings(env).vhostConfigPath;
        const handle = await startVirtualHost(configPath);

        const shutdown = (signal: string): void => {
          logger.info('serve', `Recebido ${signal}, encerrando`);
          handle.close().catch((error: unknown) => {
            logger.error('serve', 'Falha ao encerrar', { error: errorMessage(error) });
          });
        };
        process.once('SIGTERM', () => shutdown('SIGTERM'));
        process.once('SIGINT', () => shutdown('SIGINT'));
      } catch (error) {
        logger.error('serve', 'Falha fatal na inicialização', { error: errorMessage(error) });
        reportError(io, error);
      }
    });

  withTemplateOptions(program.command('install'))
    .description('Instala o VirtualHost no Apache (configtest + reload, com rollback)')
    .action(async (flags: TemplateFlags) => {
      try {
        const settings = loadSettings(env);
        const config = buildVirtualHostConfig(resolveTemplateValues(settings, templateOverrides(flags)));
        const result = await installVirtualHost(config, settings);
        io.out(`${result.message}\n`);
        if (result.validationOutput) {
          io.out(result.validationOutput.endsWith('\n') ? result.validationOutput : `${result.validationOutput}\n`);
        }
      } catch (error) {
        reportError(io, error);
      }
    });

  return program;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`Fatal: ${errorMessage(error)}\n`);
      process.exit(1);
    });
}
