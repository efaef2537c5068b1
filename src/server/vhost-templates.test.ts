import { describe, it, expect } from 'vitest';
import { buildVirtualHostConfig, FIXED_POLICY, renderVirtualHost } from './vhost-templates.js';
import { ConfigError } from './errors.js';
import type { TemplateValues } from '../shared/types.js';

const values: TemplateValues = {
  serverName: 'idds.cern.ch',
  documentRoot: '/var/www/html',
  errorLogPath: '/var/log/httpd/ssl_error_log',
  accessLogPath: '/var/log/httpd/ssl_access_log',
  tlsCertificatePath: '/etc/grid-security/hostcert.pem',
  tlsPrivateKeyPath: '/etc/grid-security/hostkey.pem',
};

describe('buildVirtualHostConfig', () => {
  it('combina os valores do template com a política fixa', () => {
    const config = buildVirtualHostConfig(values);

    expect(config).toEqual({ ...FIXED_POLICY, ...values, listenAddress: { host: '*', port: 443 } });
    expect(config.directoryListing).toBe(false);
    expect(config.overridePolicy).toBe('None');
    expect(config.serverSignatureEnabled).toBe(false);
    expect(config.tlsEnabled).toBe(true);
  });

  it('devolve um registro imutável', () => {
    const config = buildVirtualHostConfig(values);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.listenAddress)).toBe(true);
  });
});

describe('renderVirtualHost', () => {
  it('gera exatamente o bloco esperado pelo Apache', () => {
    const rendered = renderVirtualHost(buildVirtualHostConfig(values));

    expect(rendered).toBe(
      [
        '<VirtualHost *:443>',
        '  ServerName idds.cern.ch',
        '  DocumentRoot "/var/www/html"',
        '  <Directory "/var/www/html">',
        '    Options FollowSymLinks MultiViews',
        '    Options -Indexes',
        '    AllowOverride None',
        '    Require all granted',
        '  </Directory>',
        '  ErrorLog "/var/log/httpd/ssl_error_log"',
        '  ServerSignature Off',
        '  CustomLog "/var/log/httpd/ssl_access_log" combined',
        '  SSLEngine on',
        '  SSLCertificateFile "/etc/grid-security/hostcert.pem"',
        '  SSLCertificateKeyFile "/etc/grid-security/hostkey.pem"',
        '</VirtualHost>',
        '',
      ].join('\n'),
    );
  });

  it('usa Options None quando symlinks e MultiViews estão desligados', () => {
    const config = { ...buildVirtualHostConfig(values), allowSymlinks: false, multiViews: false };
    const lines = renderVirtualHost(config).split('\n');

    expect(lines[4]).toBe('    Options None');
    expect(lines[5]).toBe('    Options -Indexes');
  });

  it('recusa valores com aspas', () => {
    const config = { ...buildVirtualHostConfig(values), documentRoot: '/var/www/"html' };

    expect(() => renderVirtualHost(config)).toThrow(ConfigError);
    try {
      renderVirtualHost(config);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('VALIDATION');
        expect(error.issues).toEqual([{ field: 'documentRoot', message: 'Valor contém aspas, \\, > ou quebra de linha' }]);
      }
    }
  });

  it('recusa caminhos com barra invertida ou >', () => {
    const config = {
      ...buildVirtualHostConfig(values),
      documentRoot: '/srv/a\\b',
      errorLogPath: '/var/log/httpd/a>b',
    };

    try {
      renderVirtualHost(config);
      expect.unreachable('deveria ter lançado');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map(issue => issue.field)).toEqual(['documentRoot', 'errorLogPath']);
      }
    }
  });

  it('recusa ServerName vazio', () => {
    const config = { ...buildVirtualHostConfig(values), serverName: '' };
    expect(() => renderVirtualHost(config)).toThrow('Configuração não pode ser renderizada');
  });
});
