import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { copyFileSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { createServer, type RequestListener } from 'http';
import type { Server } from 'net';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { startVirtualHost } from './bootstrap.js';
import type { SecureServerOptions, ServerRuntime } from './runtime.js';
import { buildVirtualHostConfig, renderVirtualHost } from './vhost-templates.js';
import type { VirtualHostConfig } from '../shared/types.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./__fixtures__/tls/${name}`, import.meta.url));

const fakeRuntime = (): ServerRuntime => ({
  readFile: vi.fn((path: string) => readFileSync(path)),
  createSecureServer: vi.fn((_options: SecureServerOptions, listener: RequestListener) => createServer(listener)),
  listen: vi.fn(
    (server: Server) =>
      new Promise<void>(resolve => {
        server.listen(0, '127.0.0.1', () => resolve());
      }),
  ),
});

describe('startVirtualHost', () => {
  let dir: string;
  let configPath: string;
  let config: VirtualHostConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ssl-vhost-bootstrap-'));
    mkdirSync(join(dir, 'html'));
    mkdirSync(join(dir, 'logs'));
    writeFileSync(join(dir, 'html', 'index.html'), '<h1>home</h1>');

    config = buildVirtualHostConfig({
      serverName: 'www.example.org',
      documentRoot: join(dir, 'html'),
      errorLogPath: join(dir, 'logs', 'ssl_error_log'),
      accessLogPath: join(dir, 'logs', 'ssl_access_log'),
      tlsCertificatePath: join(dir, 'hostcert.pem'),
      tlsPrivateKeyPath: join(dir, 'hostkey.pem'),
    });
    configPath = join(dir, 'ssl.conf');
    writeFileSync(configPath, renderVirtualHost(config));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('falha sem SSLCertificateFile e não chega a escutar', async () => {
    copyFileSync(fixture('hostkey.pem'), config.tlsPrivateKeyPath);
    const runtime = fakeRuntime();

    await expect(startVirtualHost(configPath, runtime)).rejects.toMatchObject({
      code: 'ENVIRONMENT',
      issues: [{ field: 'tlsCertificatePath', message: `${config.tlsCertificatePath} não encontrado` }],
    });
    expect(runtime.readFile).not.toHaveBeenCalled();
    expect(runtime.listen).not.toHaveBeenCalled();
  });

  it('falha com o erro do parser para arquivo inválido', async () => {
    writeFileSync(configPath, '<VirtualHost *:443>\n');

    await expect(startVirtualHost(configPath, fakeRuntime())).rejects.toMatchObject({ code: 'SYNTAX' });
  });

  it('carrega, verifica e serve com certificado e chave válidos', async () => {
    copyFileSync(fixture('hostcert.pem'), config.tlsCertificatePath);
    copyFileSync(fixture('hostkey.pem'), config.tlsPrivateKeyPath);
    const runtime = fakeRuntime();

    const handle = await startVirtualHost(configPath, runtime);
    try {
      const address = handle.address;
      if (typeof address !== 'object' || address === null) {
        throw new Error('endereço inesperado');
      }

      const res = await request(`http://127.0.0.1:${address.port}`).get('/');
      expect(res.status).toBe(200);
      expect(res.text).toBe('<h1>home</h1>');
    } finally {
      await handle.close();
    }
  });
});
