import { describe, it, expect } from 'vitest';
import { loadSettings, resolveTemplateValues } from './config.js';
import { ConfigError } from './errors.js';

describe('loadSettings', () => {
  it('usa os padrões quando o ambiente está vazio', () => {
    const settings = loadSettings({});

    expect(settings.nodeEnv).toBe('development');
    expect(settings.logLevel).toBe('info');
    expect(settings.vhostConfigPath).toBe('/etc/httpd/conf.d/ssl-vhost.conf');
    expect(settings.apachectl).toBe('apachectl');
    expect(settings.reloadCommand).toBe('sudo systemctl reload httpd');
    expect(settings.useSudo).toBe(true);
    expect(settings.template).toEqual({
      serverName: undefined,
      documentRoot: '/var/www/html',
      errorLogPath: '/var/log/httpd/ssl_error_log',
      accessLogPath: '/var/log/httpd/ssl_access_log',
      tlsCertificatePath: '/etc/grid-security/hostcert.pem',
      tlsPrivateKeyPath: '/etc/grid-security/hostkey.pem',
    });
  });

  it('lê os valores do ambiente', () => {
    const settings = loadSettings({
      LOG_LEVEL: 'debug',
      VHOST_SERVER_NAME: 'idds.cern.ch',
      VHOST_DOCUMENT_ROOT: '/srv/www',
      USE_SUDO: 'no',
    });

    expect(settings.logLevel).toBe('debug');
    expect(settings.template.serverName).toBe('idds.cern.ch');
    expect(settings.template.documentRoot).toBe('/srv/www');
    expect(settings.useSudo).toBe(false);
  });

  it('lança ConfigError SETTINGS para valores inválidos', () => {
    try {
      loadSettings({ LOG_LEVEL: 'verbose', USE_SUDO: 'maybe' });
      expect.unreachable('deveria ter lançado');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('SETTINGS');
        expect(error.issues.map(issue => issue.field)).toEqual(['LOG_LEVEL', 'USE_SUDO']);
      }
    }
  });
});

describe('resolveTemplateValues', () => {
  it('prefere os valores informados aos padrões', () => {
    const settings = loadSettings({ VHOST_SERVER_NAME: 'www.example.org' });
    const values = resolveTemplateValues(settings, { documentRoot: '/srv/site', serverName: undefined });

    expect(values).toEqual({
      serverName: 'www.example.org',
      documentRoot: '/srv/site',
      errorLogPath: '/var/log/httpd/ssl_error_log',
      accessLogPath: '/var/log/httpd/ssl_access_log',
      tlsCertificatePath: '/etc/grid-security/hostcert.pem',
      tlsPrivateKeyPath: '/etc/grid-security/hostkey.pem',
    });
  });

  it('exige ServerName', () => {
    expect(() => resolveTemplateValues(loadSettings({}), {})).toThrow(
      'ServerName não informado (use --server-name ou VHOST_SERVER_NAME)',
    );
  });
});
