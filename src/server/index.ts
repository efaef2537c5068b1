import 'dotenv/config';
import { loadSettings } from './config.js';
import { errorMessage, isConfigError } from './errors.js';
import { logger } from './logger.js';
import { startVirtualHost } from './bootstrap.js';

// Error handlers globais
process.on('uncaughtException', (error) => {
	console.error('❌ UNCAUGHT EXCEPTION:', error);
	logger.error('SYSTEM', 'Uncaught exception', { error: error.message, stack: error.stack });
});

process.on('unhandledRejection', (reason) => {
	console.error('❌ UNHANDLED REJECTION:', reason);
	logger.error('SYSTEM', 'Unhandled rejection', { reason: errorMessage(reason) });
});

async function main(): Promise<void> {
	const settings = loadSettings();
	const handle = await startVirtualHost(settings.vhostConfigPath);

	console.log(`🚀 VirtualHost ativo em ${JSON.stringify(handle.address)}`);

	const shutdown = (signal: string) => {
		logger.info('SYSTEM', `Recebido ${signal}, encerrando`);
		handle
			.close()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error('SYSTEM', 'Falha ao encerrar', { error: errorMessage(error) });
				process.exit(1);
			});
	};

	process.once('SIGTERM', () => shutdown('SIGTERM'));
	process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
	// Configuração carregada tudo-ou-nada: qualquer erro impede a subida
	if (isConfigError(error)) {
		console.error(`⛔ ERRO [${error.code}]: ${error.message}`);
		for (const issue of error.issues) {
			console.error(`   - ${issue.field}: ${issue.message}`);
		}
	} else {
		console.error('⛔ ERRO:', errorMessage(error));
	}
	logger.error('SYSTEM', 'Falha fatal na inicialização', { error: errorMessage(error) });
	process.exit(1);
});
