import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, { rawBody: true });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Mandate Engine')
    .setDescription(
      'Verifies AP2 and ACP payment authorizations, tracks their lifecycle and delivers signed webhooks.',
    )
    .setVersion('0.1.0')
    .addTag('Authorizations', 'Submit, verify, revoke and audit authorizations')
    .addTag('Webhooks', 'Outbound webhook subscriptions and delivery history')
    .addTag('Alerts', 'Operational alerts for exhausted deliveries')
    .addTag('Ingest', 'Inbound ACP token lifecycle events')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4010;
  await app.listen(port);
  logger.log(`Mandate engine is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
