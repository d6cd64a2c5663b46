import 'reflect-metadata';
import { LogLevel, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

function logLevels(): LogLevel[] {
  const debug = (process.env.APP_DEBUG ?? 'false').toLowerCase() === 'true';
  return debug ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'];
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true, logger: logLevels() });
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') || 4000;
  await app.listen(port, '0.0.0.0');
}

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
