#!/usr/bin/env node
import { Server } from 'http';
import createApp from './app';
import { USAGE, VERSION, parseCliArgs } from './cli';
import { config } from './config';
import { ServiceConfig } from './config/serviceConfig';
import { errorMessage } from './errors';
import { MailPrintService } from './services/MailPrintService';
import logger, { addFileTransport, setLogLevel } from './utils/logger';

function registerDiagnostics() {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  });

  process.on('warning', (warning) => {
    logger.warn('Process warning', { name: warning.name, message: warning.message, stack: warning.stack });
  });
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (options.version) {
    console.log(`mail-print-relay ${VERSION}`);
    return 0;
  }

  registerDiagnostics();

  const serviceConfig = await ServiceConfig.load(options.configPath ?? config.configPath);
  const settings = serviceConfig.values;
  if (!process.env.LOG_LEVEL) {
    setLogLevel(settings.logging.level);
  }
  if (settings.logging.file) {
    addFileTransport(settings.logging.file);
  }

  const service = new MailPrintService(serviceConfig);

  if (options.testPrinter) {
    return (await service.testPrinterConnection()) ? 0 : 1;
  }
  if (options.testEmail) {
    return (await service.testMailboxConnection()) ? 0 : 1;
  }

  serviceConfig.validate();

  let server: Server | null = null;
  if (settings.api.enabled) {
    const app = createApp(service, { apiKey: config.api.key ?? settings.api.key });
    const port = config.api.port ?? settings.api.port;
    server = app.listen(port, settings.api.host, () => {
      logger.info(`Control API listening on ${settings.api.host}:${port}`);
    });
  }

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    service.stop().catch((error: unknown) => {
      logger.error('Error during shutdown', { error: errorMessage(error) });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await service.run();

  const httpServer = server;
  if (httpServer) {
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    logger.info('HTTP server closed');
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    logger.error('Failed to start service', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });
