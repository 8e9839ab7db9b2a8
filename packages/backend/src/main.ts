import 'reflect-metadata';
import { resolve } from 'path';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  app.enableShutdownHooks();
  app.useGlobalPipes(new ValidationPipe());
  // Webhook payloads carry base64 attachments
  app.useBodyParser('json', { limit: '10mb' });

  // Attachment links in broadcasts point here
  app.useStaticAssets(resolve(configService.get<string>('MEDIA_DIR', './media')), { prefix: '/media' });

  // Setup Swagger
  const config = new DocumentBuilder()
    .setTitle('Rollcall API')
    .setDescription('Group SMS broadcast: roster, webhook ingress, history and health')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = Number(configService.get('PORT', 4000));
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`API Documentation is available at: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
