// src/main.ts
import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PipelineExceptionFilter } from './contracts/pipeline-exception.filter';
import { LOGGER_SERVICE, type LoggerService } from './shared/types';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(
    new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }),
  );
  app.useGlobalFilters(new PipelineExceptionFilter(app.get<LoggerService>(LOGGER_SERVICE)));

  app.enableCors({
    origin: (process.env.CORS_ORIGINS ?? 'http://localhost:5173').split(','),
    methods: 'GET,HEAD,POST,DELETE',
  });

  await app.listen(Number(process.env.PORT ?? 3000));
}
void bootstrap();
