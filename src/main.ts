import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { validationPipeOptions } from './config/validation-pipe.options';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ValidationPipe(validationPipeOptions));

  const configService = app.get(ConfigService);
  const frontendOrigin = configService.get<string>('frontend.origin') ?? 'http://localhost:3001';
  const isDevelopment = (process.env.NODE_ENV ?? 'development') === 'development';

  // Comma-separated list of allowed origins
  const allowedOrigins = frontendOrigin
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  app.enableCors({
    origin: isDevelopment ? true : allowedOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Authorization'],
    maxAge: 86400,
  });

  const port = configService.get<number>('port') ?? 3000;

  await app.listen(port);
  Logger.log(`Server listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Failed to start server: ${(error as Error).message}`, (error as Error).stack, 'Bootstrap');
  process.exit(1);
});
