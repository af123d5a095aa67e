import type { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule } from '@nestjs/swagger';
import type { AppConfig } from './config/app.config';
import { swaggerConfig } from './config/swagger.config';

export const DOCS_PATH = 'docs';

/**
 * Body parsing, route prefix, CORS and OpenAPI docs. Shared by the server bootstrap and the
 * end-to-end tests.
 */
export function setupApp(
  app: NestExpressApplication,
  config: Pick<AppConfig, 'globalPrefix' | 'corsOrigins'>,
): void {
  // Scalar JSON bodies ("Hi", null, 42) reach the chat validator as-is
  app.useBodyParser('json', { strict: false });

  if (config.globalPrefix) {
    app.setGlobalPrefix(config.globalPrefix);
  }

  // Every origin is allowed unless CORS_ORIGINS narrows it down
  app.enableCors({
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true,
    methods: 'GET,HEAD,POST,OPTIONS',
  });

  // Swagger Documentation
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup(DOCS_PATH, app, document);
}
