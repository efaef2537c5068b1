import { accessSync, constants, existsSync, readFileSync, statSync } from 'fs';
import { dirname } from 'path';
import { X509Certificate, createPrivateKey } from 'crypto';
import type { ValidationIssue, VirtualHostConfig } from '../../shared/types.js';
import { ConfigError, errorMessage } from '../errors.js';

export interface PathCheck {
	path: string;
	exists: boolean;
	readable: boolean;
}

export interface PemCheck extends PathCheck {
	pem: boolean;
}

export interface LogDirectoryCheck {
	path: string;
	exists: boolean;
	writable: boolean;
}

export interface EnvironmentStatus {
	server: {
		platform: string;
		nodeVersion: string;
		pid: number;
		uptime: number;
	};
	documentRoot: PathCheck & { isDirectory: boolean };
	tls: {
		certificate: PemCheck;
		privateKey: PemCheck;
		keyMatchesCertificate: boolean;
		matchError?: string;
	};
	logs: {
		errorLog: LogDirectoryCheck;
		accessLog: LogDirectoryCheck;
	};
	timestamp: string;
}

function canAccess(path: string, mode: number): boolean {
	try {
		accessSync(path, mode);
		return true;
	} catch {
		return false;
	}
}

function checkPath(path: string): PathCheck {
	const exists = existsSync(path);
	return { path, exists, readable: exists && canAccess(path, constants.R_OK) };
}

function checkPem(path: string, marker: RegExp): PemCheck {
	const base = checkPath(path);
	if (!base.readable) {
		return { ...base, pem: false };
	}
	try {
		return { ...base, pem: marker.test(readFileSync(path, 'utf-8')) };
	} catch {
		return { ...base, pem: false };
	}
}

function checkLogDirectory(logPath: string): LogDirectoryCheck {
	const path = dirname(logPath);
	const exists = existsSync(path);
	return { path, exists, writable: exists && canAccess(path, constants.W_OK) };
}

function checkKeyPair(certPath: string, keyPath: string): { matches: boolean; error?: string } {
	try {
		const certificate = new X509Certificate(readFileSync(certPath));
		const key = createPrivateKey(readFileSync(keyPath));
		return { matches: certificate.checkPrivateKey(key) };
	} catch (error) {
		return { matches: false, error: errorMessage(error) };
	}
}

/**
 * Verifica certificado, chave, DocumentRoot e diretórios de log antes de subir
 */
export function checkEnvironment(config: VirtualHostConfig): EnvironmentStatus {
	const documentRoot = checkPath(config.documentRoot);
	const certificate = checkPem(config.tlsCertificatePath, /-----BEGIN CERTIFICATE-----/);
	const privateKey = checkPem(config.tlsPrivateKeyPath, /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----/);

	const keyPair = certificate.pem && privateKey.pem
		? checkKeyPair(config.tlsCertificatePath, config.tlsPrivateKeyPath)
		: { matches: false };

	return {
		server: {
			platform: process.platform,
			nodeVersion: process.version,
			pid: process.pid,
			uptime: process.uptime(),
		},
		documentRoot: {
			...documentRoot,
			isDirectory: documentRoot.exists && statSync(config.documentRoot).isDirectory(),
		},
		tls: {
			certificate,
			privateKey,
			keyMatchesCertificate: keyPair.matches,
			matchError: keyPair.error,
		},
		logs: {
			errorLog: checkLogDirectory(config.errorLogPath),
			accessLog: checkLogDirectory(config.accessLogPath),
		},
		timestamp: new Date().toISOString(),
	};
}

/**
 * Lista os problemas de um EnvironmentStatus (vazio = pode subir)
 */
export function environmentIssues(status: EnvironmentStatus): ValidationIssue[] {
	const issues: ValidationIssue[] = [];
	const { documentRoot, tls, logs } = status;

	if (!documentRoot.exists) {
		issues.push({ field: 'documentRoot', message: `${documentRoot.path} não encontrado` });
	} else if (!documentRoot.isDirectory) {
		issues.push({ field: 'documentRoot', message: `${documentRoot.path} não é um diretório` });
	} else if (!documentRoot.readable) {
		issues.push({ field: 'documentRoot', message: `${documentRoot.path} sem permissão de leitura` });
	}

	const pemChecks = [
		['tlsCertificatePath', tls.certificate, 'certificado'],
		['tlsPrivateKeyPath', tls.privateKey, 'chave privada'],
	] as const;

	for (const [field, check, label] of pemChecks) {
		if (!check.exists) {
			issues.push({ field, message: `${check.path} não encontrado` });
		} else if (!check.readable) {
			issues.push({ field, message: `${check.path} sem permissão de leitura` });
		} else if (!check.pem) {
			issues.push({ field, message: `${check.path} não contém ${label} PEM` });
		}
	}

	if (tls.certificate.pem && tls.privateKey.pem && !tls.keyMatchesCertificate) {
		issues.push({
			field: 'tlsPrivateKeyPath',
			message: tls.matchError
				? `Falha ao comparar chave e certificado: ${tls.matchError}`
				: 'Chave privada não corresponde ao certificado',
		});
	}

	const logChecks = [
		['errorLogPath', logs.errorLog],
		['accessLogPath', logs.accessLog],
	] as const;

	for (const [field, check] of logChecks) {
		if (!check.exists) {
			issues.push({ field, message: `Diretório de log ${check.path} não encontrado` });
		} else if (!check.writable) {
			issues.push({ field, message: `Diretório de log ${check.path} sem permissão de escrita` });
		}
	}

	return issues;
}

/**
 * Falha fatal se o ambiente não permitir subir o VirtualHost
 */
export function assertEnvironment(config: VirtualHostConfig): EnvironmentStatus {
	const status = checkEnvironment(config);
	const issues = environmentIssues(status);

	if (issues.length > 0) {
		throw new ConfigError(
			'ENVIRONMENT',
			`Ambiente inválido para ${config.serverName}: ${issues.map(i => i.message).join('; ')}`,
			{ issues },
		);
	}

	return status;
}
