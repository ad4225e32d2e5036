import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { I18nValidationPipe } from 'nestjs-i18n';
import { AppModule } from './app.module';

const API_PREFIX = 'api/v1';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  // Get ConfigService
  const configService = app.get(ConfigService);

  app.setGlobalPrefix(API_PREFIX);

  // Validation failures surface through ApiExceptionFilter
  app.useGlobalPipes(
    new I18nValidationPipe({
      whitelist: true,
      transform: true,
      stopAtFirstError: true,
    }),
  );

  // Global logger
  const isProd =
    configService.get<string>('app.env', 'development') === 'production';
  app.useLogger(
    isProd ? ['error', 'warn'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  );

  app.enableCors();
  app.enableShutdownHooks();

  const port = configService.get<number>('app.port', 3000);
  await app.listen(port);

  const name = configService.get<string>('app.name', 'site-cms-api');
  Logger.log(
    `${name} is running on: http://localhost:${port}/${API_PREFIX}`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error('Application failed to start', String(error), 'Bootstrap');
  process.exit(1);
});
