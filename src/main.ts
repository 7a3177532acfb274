import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { APP_NAME, APP_VERSION } from './app.controller';
import { AppModule } from './app.module';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  // Any origin when FRONTEND_URL is unset
  const frontendUrl = configService.get<string>('FRONTEND_URL');
  app.enableCors({ origin: frontendUrl || true, credentials: true });

  app.useGlobalPipes(createValidationPipe());

  // Health endpoints stay at the root
  app.setGlobalPrefix('api/v1', { exclude: ['/', 'health'] });

  const swaggerConfig = new DocumentBuilder()
    .setTitle(APP_NAME)
    .setDescription('날씨 기반 여행 계획 API')
    .setVersion(APP_VERSION)
    .addBearerAuth()
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swaggerConfig));

  const port = configService.get<number>('PORT') ?? 8000;
  await app.listen(port);
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
