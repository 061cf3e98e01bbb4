#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { runCli } from './cli';
import { logLevelsFrom } from './sorting/config/sorting.config';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFrom(process.env.SORTING_LOG_LEVEL),
  });

  try {
    process.exitCode = runCli(app, process.argv.slice(2));
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
