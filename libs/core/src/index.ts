export * from './core.module';
export * from './database.schema';
export * from './database.service';
export * from './env.schema';
export * from './errors';
export * from './queue.constants';
export * from './redis.connection';
export * from './redis.service';
export * from './timeout';
