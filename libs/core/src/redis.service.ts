import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { createRedisConnection } from './redis.connection';

@Injectable()
export class RedisService extends Redis implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);

  constructor(configService: ConfigService) {
    super({ ...createRedisConnection(configService), lazyConnect: true });
    this.on('error', (error: Error) => {
      this.logger.warn(JSON.stringify({ event: 'redis_error', message: error.message }));
    });
  }

  async onModuleDestroy(): Promise<void> {
    if (this.status === 'wait' || this.status === 'end') {
      return;
    }
    await this.quit();
  }
}
