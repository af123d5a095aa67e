import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { DOCS_PATH, setupApp } from './app.setup';
import type { AppConfig } from './config/app.config';

async function bootstrap() {
  // Logs are held until LOG_LEVEL is known (it may come from .env)
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  const logger = new Logger('Bootstrap');

  const config = app.get(ConfigService).getOrThrow<AppConfig>('app');
  app.useLogger(config.logLevels);
  setupApp(app, config);

  await app.listen(config.port);
  logger.log(`Application is running on: http://localhost:${config.port}`);
  logger.log(
    `Swagger docs available at: http://localhost:${config.port}/${DOCS_PATH}`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').fatal(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
