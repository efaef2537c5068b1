import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadVirtualHostConfig, parseVirtualHost } from './parser.js';
import { buildVirtualHostConfig, renderVirtualHost } from './vhost-templates.js';
import { ConfigError } from './errors.js';
import type { VirtualHostConfig } from '../shared/types.js';

const baseConfig = buildVirtualHostConfig({
  serverName: 'idds.cern.ch',
  documentRoot: '/var/www/html',
  errorLogPath: '/var/log/httpd/ssl_error_log',
  accessLogPath: '/var/log/httpd/ssl_access_log',
  tlsCertificatePath: '/etc/grid-security/hostcert.pem',
  tlsPrivateKeyPath: '/etc/grid-security/hostkey.pem',
});

const rendered = renderVirtualHost(baseConfig);

function expectError(result: VirtualHostConfig | ConfigError): ConfigError {
  if (!(result instanceof ConfigError)) {
    throw new Error(`Esperava ConfigError, recebeu ${JSON.stringify(result)}`);
  }
  return result;
}

function replaceLine(content: string, from: string, to: string): string {
  if (!content.includes(from)) {
    throw new Error(`Linha não encontrada: ${from}`);
  }
  return content.replace(from, to);
}

describe('parseVirtualHost', () => {
  it('devolve o mesmo registro que foi renderizado', () => {
    expect(parseVirtualHost(rendered)).toEqual(baseConfig);
  });

  it('preserva valores alternativos de Options no round-trip', () => {
    const variant: VirtualHostConfig = { ...baseConfig, allowSymlinks: false, multiViews: true };
    expect(parseVirtualHost(renderVirtualHost(variant))).toEqual(variant);
  });

  it('aceita comentários, maiúsculas variadas, continuação de linha e CRLF', () => {
    const content = [
      '# Gerado pelo gerenciador de configuração',
      '<virtualhost *:443>',
      '    servername idds.cern.ch',
      '',
      '\tDocumentRoot /var/www/html',
      '    <DIRECTORY "/var/www/html/">',
      '        Options FollowSymLinks \\',
      '                MultiViews',
      '        Options -Indexes',
      '        AllowOverride none',
      '        Require all granted',
      '    </directory>',
      '    ErrorLog "/var/log/httpd/ssl_error_log"',
      '    CustomLog "/var/log/httpd/ssl_access_log" COMBINED',
      '    SSLEngine On',
      '    SSLCertificateFile /etc/grid-security/hostcert.pem',
      '    SSLCertificateKeyFile "/etc/grid-security/hostkey.pem"',
      '</VirtualHost>',
    ].join('\r\n');

    expect(parseVirtualHost(content)).toEqual(baseConfig);
  });

  it('usa ServerSignature Off e AllowOverride None quando ausentes', () => {
    const content = rendered.replace('  ServerSignature Off\n', '').replace('    AllowOverride None\n', '');
    const result = parseVirtualHost(content);

    expect(result).toEqual(baseConfig);
  });

  it('rejeita diretiva desconhecida com o número da linha', () => {
    const content = replaceLine(rendered, '  ServerSignature Off', '  ServerAlias www.idds.cern.ch');
    const error = expectError(parseVirtualHost(content, 'ssl.conf'));

    expect(error.code).toBe('UNKNOWN_DIRECTIVE');
    expect(error.line).toBe(11);
    expect(error.message).toBe('ssl.conf:11: Diretiva não suportada: ServerAlias');
  });

  it('rejeita diretiva repetida', () => {
    const content = replaceLine(rendered, '  ServerSignature Off', '  ServerName other.cern.ch');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('DUPLICATE_DIRECTIVE');
    expect(error.line).toBe(11);
  });

  it('rejeita diretiva obrigatória ausente', () => {
    const content = rendered.replace('  SSLCertificateKeyFile "/etc/grid-security/hostkey.pem"\n', '');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('MISSING_DIRECTIVE');
    expect(error.message).toBe('<config>:1: SSLCertificateKeyFile ausente');
  });

  it('rejeita seção não fechada', () => {
    const content = rendered.replace('  </Directory>\n', '');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('SYNTAX');
    expect(error.line).toBe(15);
  });

  it('rejeita aspas não fechadas', () => {
    const content = replaceLine(rendered, '  ErrorLog "/var/log/httpd/ssl_error_log"', '  ErrorLog "/var/log/httpd/ssl_error_log');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('SYNTAX');
    expect(error.line).toBe(10);
  });

  it('rejeita valores inválidos', () => {
    const engine = expectError(parseVirtualHost(replaceLine(rendered, 'SSLEngine on', 'SSLEngine maybe')));
    expect(engine.code).toBe('INVALID_VALUE');
    expect(engine.line).toBe(13);

    const mixed = expectError(
      parseVirtualHost(replaceLine(rendered, 'Options FollowSymLinks MultiViews', 'Options FollowSymLinks +MultiViews')),
    );
    expect(mixed.code).toBe('INVALID_VALUE');
    expect(mixed.line).toBe(5);

    const port = expectError(parseVirtualHost(replaceLine(rendered, '<VirtualHost *:443>', '<VirtualHost *:https>')));
    expect(port.code).toBe('INVALID_VALUE');
    expect(port.line).toBe(1);
  });

  it('rejeita <Directory> diferente do DocumentRoot', () => {
    const content = replaceLine(rendered, '<Directory "/var/www/html">', '<Directory "/srv/www">');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('INVALID_VALUE');
    expect(error.line).toBe(4);
  });

  it('rejeita mais de um <VirtualHost>', () => {
    const error = expectError(parseVirtualHost(rendered + rendered));

    expect(error.code).toBe('DUPLICATE_DIRECTIVE');
    expect(error.line).toBe(17);
  });

  it('rejeita arquivo sem <VirtualHost>', () => {
    expect(expectError(parseVirtualHost('# vazio\n')).code).toBe('MISSING_DIRECTIVE');
  });

  it('valida o registro depois de parsear', () => {
    const content = rendered
      .replace('<VirtualHost *:443>', '<VirtualHost *:8443>')
      .replace('Options -Indexes', 'Options +Indexes');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('VALIDATION');
    expect(error.issues.map(issue => issue.field)).toEqual(['listenAddress', 'directoryListing']);
  });

  it('recusa barra invertida no caminho em vez de devolver outro valor', () => {
    const content = rendered.replaceAll('"/var/www/html"', '"/srv/a\\\\b"');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('VALIDATION');
    expect(error.issues.map(issue => issue.field)).toEqual(['documentRoot']);
  });

  it('recusa barra invertida final no caminho', () => {
    const content = rendered.replaceAll('"/var/www/html"', '"/srv/site\\"');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('SYNTAX');
  });

  it('recusa > no caminho do <Directory>', () => {
    const content = rendered.replaceAll('"/var/www/html"', '"/srv/a>b"');
    const error = expectError(parseVirtualHost(content));

    expect(error.code).toBe('SYNTAX');
    expect(error.line).toBe(4);
  });

  it('aplica Options na ordem, como o Apache', () => {
    const content = replaceLine(
      rendered,
      '    Options FollowSymLinks MultiViews\n    Options -Indexes',
      '    Options All\n    Options -Indexes -FollowSymLinks +MultiViews',
    );
    const result = parseVirtualHost(content);

    expect(result).toEqual({ ...baseConfig, allowSymlinks: false, multiViews: true });
  });
});

describe('loadVirtualHostConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ssl-vhost-parser-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lê e parseia o arquivo', () => {
    const file = join(dir, 'ssl.conf');
    writeFileSync(file, rendered);

    expect(loadVirtualHostConfig(file)).toEqual(baseConfig);
  });

  it('devolve FILE_NOT_FOUND para arquivo inexistente', () => {
    const error = expectError(loadVirtualHostConfig(join(dir, 'missing.conf')));
    expect(error.code).toBe('FILE_NOT_FOUND');
  });

  it('inclui o caminho do arquivo nos erros de sintaxe', () => {
    const file = join(dir, 'broken.conf');
    writeFileSync(file, rendered.replace('</VirtualHost>', '</Directory>'));
    const error = expectError(loadVirtualHostConfig(file));

    expect(error.code).toBe('SYNTAX');
    expect(error.message).toBe(`${file}:16: </Directory> não fecha <VirtualHost> (linha 1)`);
  });
});
