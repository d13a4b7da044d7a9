import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { resolveLogLevels } from './core/config/log-levels';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const logger = new Logger('Bootstrap');

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') || 3000;
  const apiPrefix = configService.get<string>('app.apiPrefix') || 'api/v1';
  const production = configService.get<string>('app.env') === 'production';

  configureApp(app, {
    apiPrefix,
    corsOrigins: configService.get<string[]>('app.corsOrigins'),
    production,
    version: configService.get<string>('app.version'),
  });

  if (!production) {
    logger.log(`Swagger docs available at: http://localhost:${port}/${apiPrefix}/docs`);
  }

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.log('SIGTERM received, shutting down gracefully');
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', error instanceof Error ? error.stack : String(error));
        process.exit(1);
      });
  });

  await app.listen(port);

  logger.log(`Shift scheduling backend running on: http://localhost:${port}/${apiPrefix}`);
  logger.log(`Environment: ${configService.get<string>('app.env')}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Error starting server:', error);
  process.exit(1);
});
