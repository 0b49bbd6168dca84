// Application entry point.
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { configureApp } from './app.setup';
import { AppModule } from './module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  configureApp(app, config.get<string>('GLOBAL_PREFIX') ?? 'v1');

  const port = config.get<number>('PORT') ?? 4000;
  await app.listen(port);
  Logger.log(`API on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch(err => {
  Logger.error('boot failed', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
