import 'reflect-metadata';
import { config as loadEnv } from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { logConfigurationSummary, resolveLogLevels } from './config/config.utils';
import type { ExporterConfiguration } from './config/config.types';
import { ConfigurationError } from './shared/errors';
import { getErrorMessage } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    // A local .env file is optional; real deployments pass the environment directly
    loadEnv();

    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: resolveLogLevels(process.env.LOG_LEVEL),
      // Surface configuration errors to the catch below instead of aborting the process
      abortOnError: false,
    });

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService).getOrThrow<ExporterConfiguration>('exporter');

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        const stack = shutdownError instanceof Error ? shutdownError.stack : undefined;
        logger.error(`Error during shutdown: ${getErrorMessage(shutdownError)}`, stack);
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    logConfigurationSummary(config);

    if (config.environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Mail Health Exporter')
        .setDescription('Prometheus metrics and status page for mail delivery checks.')
        .setVersion('1.0')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    await app.listen(config.http.port, '0.0.0.0');
    logger.log(`Mail health exporter listening on port ${config.http.port}`);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      process.exit(1);
    }
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, errorStack);
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
