import 'dotenv/config';
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { resolveLogLevels } from './log-levels';
import { WorkerModule } from './worker.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(WorkerModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3001);
  const host = '0.0.0.0';
  const logger = new Logger('WorkerBootstrap');

  await app.listen(port, host);
  logger.log(`Worker listening on ${host}:${port}`);
}

void bootstrap();
