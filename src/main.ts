import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  app.enableCors();
  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Checkpoint server listening on :${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    'Bootstrap failed',
    err instanceof Error ? err.stack : String(err),
    'Bootstrap',
  );
  process.exit(1);
});
