import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { SchemaModule } from './schema.module';
import { SchemaService } from './schema.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(SchemaModule, {
    logger: ['log', 'error', 'warn'],
  });

  try {
    await app.get(SchemaService).run();
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
