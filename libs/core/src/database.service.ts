import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { schema } from './database.schema';

export type Database = PostgresJsDatabase<typeof schema>;

/**
 * Owns the postgres.js pool and the drizzle handle built on it.
 * Injected wherever a store needs the database; there is no module-level client.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly sql: postgres.Sql;
  readonly db: Database;

  constructor(configService: ConfigService) {
    const url = configService.get<string>('DATABASE_URL');
    if (!url) {
      throw new Error('DATABASE_URL is required');
    }

    this.sql = postgres(url, {
      max: configService.get<number>('DATABASE_POOL_MAX', 10),
      idle_timeout: 30,
      connect_timeout: 10,
    });
    this.db = drizzle(this.sql, {
      schema,
      logger: configService.get<string>('LOG_LEVEL') === 'trace',
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.sql.end({ timeout: 5 });
    this.logger.log('Database pool closed');
  }
}
