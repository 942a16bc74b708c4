import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the NestJS HTTP service
 */
async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  // Get services
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const logger = await app.resolve(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  // Get configuration
  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const port = configService.get('port', { infer: true });

  // Enable graceful shutdown: SIGTERM/SIGINT close the app, which drains
  // the signing pool before the AWS clients are released
  app.enableShutdownHooks(['SIGTERM', 'SIGINT']);

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen(port);

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      port,
      jobStore: configService.get('jobStore', { infer: true }).driver,
      artifactStore: configService.get('artifactStore', { infer: true }).driver,
    },
    'Video signing service started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start video signing service:', error);
  process.exit(1);
});
