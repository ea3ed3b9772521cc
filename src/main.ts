import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { apiReference } from '@scalar/nestjs-api-reference';
import compression from 'compression';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // Security headers — sets X-Content-Type-Options, X-Frame-Options, etc.
  app.use(helmet({ contentSecurityPolicy: false }));

  app.use(compression());

  // Sanitised errors, no stack traces exposed
  app.useGlobalFilters(new GlobalExceptionFilter());

  // Closes the SQLite handle on SIGTERM / SIGINT
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Retail Sales Warehouse')
    .setDescription(
      'Read-only sales metrics over a star-schema warehouse built from online retail order lines. ' +
        'The warehouse is rebuilt from the source CSV at startup; metrics are pre-computed after each load.',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-json', app, document, { jsonDocumentUrl: '/api-json' });

  app.use(
    '/docs',
    apiReference({
      spec: { content: document },
      theme: 'purple',
      pageTitle: 'Retail Sales Warehouse',
    }),
  );

  const port = process.env.PORT || 8080;
  await app.listen(port);
  console.log(`\n🚀 API running on http://localhost:${port}`);
  console.log(`📖 API docs    → http://localhost:${port}/docs`);
  console.log(`🏥 Health      → http://localhost:${port}/health\n`);
}

bootstrap().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
