/**
 * Servidor HTTPS estático que aplica um VirtualHostConfig
 */
import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import morgan from 'morgan';
import serveIndex from 'serve-index';
import { createServer as createHttpsServer } from 'https';
import type { RequestListener } from 'http';
import type { AddressInfo, Server } from 'net';
import type { Writable } from 'stream';
import { once } from 'events';
import { createWriteStream, readFileSync } from 'fs';
import { realpath, stat } from 'fs/promises';
import { join, relative, resolve, sep } from 'path';
import type { ListenAddress, VirtualHostConfig } from '../shared/types.js';
import { ConfigError, errorMessage } from './errors.js';
import { createErrorLog, logger, type BaseLogger, type ErrorLogHandle } from './logger.js';

export interface SecureServerOptions {
  cert: Buffer;
  key: Buffer;
}

/**
 * O que o VirtualHost precisa do processo: ler os PEM, criar o servidor TLS e escutar
 */
export interface ServerRuntime {
  readFile(path: string): Buffer;
  createSecureServer(options: SecureServerOptions, listener: RequestListener): Server;
  listen(server: Server, address: Readonly<ListenAddress>): Promise<void>;
}

export const nodeRuntime: ServerRuntime = {
  readFile: path => readFileSync(path),
  createSecureServer: (options, listener) => createHttpsServer(options, listener),
  listen: (server, { host, port }) =>
    new Promise<void>((resolvePromise, reject) => {
      server.once('error', reject);
      // '*' = todas as interfaces
      server.listen(port, host === '*' ? undefined : host, () => {
        server.off('error', reject);
        resolvePromise();
      });
    }),
};

export interface VirtualHostLogs {
  accessLog: Writable;
  errorLog: BaseLogger;
}

export interface AppliedVirtualHost {
  server: Server;
  address: AddressInfo | string | null;
  close(): Promise<void>;
}

type ErrorStatus = 403 | 404 | 500;

const STATUS_PAGES: Record<ErrorStatus, { title: string; message: string }> = {
  403: { title: 'Forbidden', message: "You don't have permission to access this resource." },
  404: { title: 'Not Found', message: 'The requested URL was not found on this server.' },
  500: {
    title: 'Internal Server Error',
    message: 'The server encountered an internal error and was unable to complete your request.',
  },
};

export const DIRECTORY_INDEX = ['index.html', 'index.htm'];

const MULTIVIEWS_EXTENSIONS = ['html', 'htm'];

/**
 * Página de erro no estilo do Apache; a assinatura só aparece com ServerSignature On
 */
export function renderErrorPage(status: ErrorStatus, config: VirtualHostConfig): string {
  const page = STATUS_PAGES[status];
  const signature = config.serverSignatureEnabled
    ? `<hr>\n<address>${config.serverName} Port ${config.listenAddress.port}</address>\n`
    : '';

  return [
    '<!DOCTYPE HTML PUBLIC "-//IETF//DTD HTML 2.0//EN">',
    '<html><head>',
    `<title>${status} ${page.title}</title>`,
    '</head><body>',
    `<h1>${page.title}</h1>`,
    `<p>${page.message}</p>`,
    `${signature}</body></html>`,
    '',
  ].join('\n');
}

function sendError(res: Response, status: ErrorStatus, config: VirtualHostConfig): void {
  res.status(status).type('html').send(renderErrorPage(status, config));
}

/**
 * Caminho do arquivo pedido dentro do DocumentRoot (null se inválido ou fora dele)
 */
export function resolveRequestPath(documentRoot: string, requestPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return null;
  }

  if (decoded.includes('\0')) {
    return null;
  }

  const root = resolve(documentRoot);
  const target = resolve(root, '.' + decoded);
  if (target !== root && !target.startsWith(root + sep)) {
    return null;
  }
  return target;
}

function asyncHandler(handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Sem FollowSymLinks: nega qualquer arquivo alcançado através de um symlink
 */
function symlinkGuard(config: VirtualHostConfig, errorLog: BaseLogger): RequestHandler {
  let realRoot: Promise<string> | undefined;

  return asyncHandler(async (req, res, next) => {
    const target = resolveRequestPath(config.documentRoot, req.path);
    if (!target) {
      next();
      return;
    }

    if (!realRoot) {
      realRoot = realpath(config.documentRoot);
    }
    const root = await realRoot;

    let real: string;
    try {
      real = await realpath(target);
    } catch {
      // Arquivo inexistente: o static decide (404)
      next();
      return;
    }

    const expected = join(root, relative(resolve(config.documentRoot), target));
    if (real !== expected) {
      errorLog.error(
        { client: req.ip, path: req.path, target: real },
        'Symbolic link not allowed or link target not accessible',
      );
      sendError(res, 403, config);
      return;
    }

    next();
  });
}

/**
 * Diretório sem DirectoryIndex e sem listagem: 403. O resto: 404.
 */
function fallbackHandler(config: VirtualHostConfig, errorLog: BaseLogger): RequestHandler {
  return asyncHandler(async (req, res) => {
    const target = resolveRequestPath(config.documentRoot, req.path);

    if (target) {
      const stats = await stat(target).catch(() => null);
      if (stats?.isDirectory()) {
        errorLog.error(
          { client: req.ip, path: req.path },
          'Cannot serve directory: No matching DirectoryIndex found, and server-generated directory index forbidden by Options directive',
        );
        sendError(res, 403, config);
        return;
      }
    }

    sendError(res, 404, config);
  });
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Monta o app Express que serve o DocumentRoot conforme o registro
 */
export function createVirtualHostApp(config: VirtualHostConfig, { accessLog, errorLog }: VirtualHostLogs): Express {
  const app = express();

  app.disable('x-powered-by');

  // CustomLog
  app.use(morgan(config.accessLogFormat, { stream: accessLog }));

  if (config.accessControl === 'all denied') {
    app.use((_req, res) => sendError(res, 403, config));
    return app;
  }

  if (!config.allowSymlinks) {
    app.use(symlinkGuard(config, errorLog));
  }

  app.use(
    express.static(config.documentRoot, {
      index: DIRECTORY_INDEX,
      dotfiles: 'ignore',
      redirect: true,
      extensions: config.multiViews ? MULTIVIEWS_EXTENSIONS : false,
    }),
  );

  if (config.directoryListing) {
    app.use(serveIndex(config.documentRoot, { icons: false }));
  }

  app.use(fallbackHandler(config, errorLog));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(error);
    if (status === 403 || status === 404) {
      sendError(res, status, config);
      return;
    }

    errorLog.error({ client: req.ip, path: req.path, err: error }, 'Falha ao servir requisição');
    if (res.headersSent) {
      res.end();
      return;
    }
    sendError(res, 500, config);
  });

  return app;
}

/**
 * Sobe o VirtualHost: lê os PEM, abre os logs e escuta no endereço configurado
 */
export async function applyVirtualHost(
  config: VirtualHostConfig,
  runtime: ServerRuntime = nodeRuntime,
): Promise<AppliedVirtualHost> {
  if (config.overridePolicy !== 'None') {
    throw new ConfigError('VALIDATION', `AllowOverride ${config.overridePolicy} não é suportado`);
  }
  if (!config.tlsEnabled) {
    throw new ConfigError('VALIDATION', 'SSLEngine off não é suportado: o VirtualHost exige TLS');
  }

  const readPem = (path: string, label: string): Buffer => {
    try {
      return runtime.readFile(path);
    } catch (error) {
      throw new ConfigError('ENVIRONMENT', `Não foi possível ler ${label} ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  };

  const cert = readPem(config.tlsCertificatePath, 'SSLCertificateFile');
  const key = readPem(config.tlsPrivateKeyPath, 'SSLCertificateKeyFile');

  let errorLog: ErrorLogHandle;
  try {
    errorLog = createErrorLog(config.errorLogPath);
  } catch (error) {
    throw new ConfigError('ENVIRONMENT', `Não foi possível abrir ErrorLog ${config.errorLogPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const accessLog = createWriteStream(config.accessLogPath, { flags: 'a' });
  try {
    await once(accessLog, 'open');
  } catch (error) {
    errorLog.close();
    throw new ConfigError('ENVIRONMENT', `Não foi possível abrir CustomLog ${config.accessLogPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  accessLog.on('error', error => {
    logger.error('applyVirtualHost', 'Falha ao escrever CustomLog', {
      path: config.accessLogPath,
      error: error.message,
    });
  });

  const closeLogs = (): void => {
    accessLog.end();
    errorLog.close();
  };

  const app = createVirtualHostApp(config, { accessLog, errorLog: errorLog.logger });

  let server: Server;
  try {
    server = runtime.createSecureServer({ cert, key }, app);
  } catch (error) {
    closeLogs();
    throw new ConfigError('ENVIRONMENT', `Certificado ou chave inválidos: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await runtime.listen(server, config.listenAddress);
  } catch (error) {
    closeLogs();
    const { host, port } = config.listenAddress;
    throw new ConfigError('ENVIRONMENT', `Não foi possível escutar em ${host}:${port}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  errorLog.logger.info({ serverName: config.serverName }, 'VirtualHost iniciado');
  logger.info('applyVirtualHost', `VirtualHost ${config.serverName} escutando`, {
    address: server.address(),
    documentRoot: config.documentRoot,
  });

  return {
    server,
    address: server.address(),
    close: () =>
      new Promise<void>((resolvePromise, reject) => {
        server.close(error => {
          closeLogs();
          if (error) {
            reject(error);
            return;
          }
          resolvePromise();
        });
      }),
  };
}
