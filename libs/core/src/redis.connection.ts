import { ConfigService } from '@nestjs/config';
import { RedisOptions } from 'ioredis';

const DEFAULT_REDIS_PORT = 6379;

export const parseRedisUrl = (redisUrl: string): RedisOptions => {
  const url = new URL(redisUrl);
  const options: RedisOptions = {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
  };

  if (url.username) {
    options.username = decodeURIComponent(url.username);
  }

  if (url.password) {
    options.password = decodeURIComponent(url.password);
  }

  if (url.pathname && url.pathname !== '/') {
    const db = Number(url.pathname.replace('/', ''));
    if (!Number.isNaN(db)) {
      options.db = db;
    }
  }

  if (url.protocol === 'rediss:') {
    options.tls = {};
  }

  return options;
};

const baseRedisOptions = (configService: ConfigService): RedisOptions => {
  const redisUrl = configService.get<string>('REDIS_URL');
  return redisUrl
    ? parseRedisUrl(redisUrl)
    : {
        host: configService.get<string>('REDIS_HOST', 'localhost'),
        port: configService.get<number>('REDIS_PORT', DEFAULT_REDIS_PORT),
        password: configService.get<string>('REDIS_PASSWORD') || undefined,
      };
};

/** Plain command client: a command fails after a few reconnect attempts instead of waiting for Redis forever. */
export const createRedisConnection = (configService: ConfigService): RedisOptions => ({
  ...baseRedisOptions(configService),
  maxRetriesPerRequest: 3,
});

/** BullMQ refuses blocking connections that retry per request, hence `maxRetriesPerRequest: null`. */
export const createQueueConnection = (configService: ConfigService): RedisOptions => ({
  ...baseRedisOptions(configService),
  maxRetriesPerRequest: null,
});
