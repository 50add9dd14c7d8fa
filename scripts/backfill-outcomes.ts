import 'dotenv/config';
import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { DatabaseService, envSchemaWithRefinements } from '@libs/core';
import { BinanceCandleFeed, TwelveDataCandleFeed } from '@libs/market-data';
import { backfillOutcomes, DrizzleSignalStore } from '@libs/signals';

const readFlag = (name: string): string | undefined => {
  const prefix = `--${name}=`;
  return process.argv.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
};

const main = async (): Promise<void> => {
  const env = envSchemaWithRefinements.parse(process.env);
  const configService = new ConfigService(env);

  const database = new DatabaseService(configService);
  const store = new DrizzleSignalStore(database);
  const feed =
    env.CANDLE_PROVIDER === 'BINANCE'
      ? new BinanceCandleFeed(configService)
      : new TwelveDataCandleFeed(configService);

  const limit = Number(readFlag('limit') ?? 200);
  try {
    const report = await backfillOutcomes(store, feed, Date.now(), {
      limit: Number.isFinite(limit) && limit > 0 ? limit : 200,
      maxLookback: env.WATCHER_MAX_LOOKBACK,
      asset: readFlag('asset'),
    });

    for (const row of report.outcomes) {
      console.info(
        `${row.signalId} ${row.asset} ${row.direction} stored=${row.storedState} replay=${row.outcome} R=${row.rMultiple.toFixed(2)}`,
      );
    }
    for (const row of report.skipped) {
      console.warn(`${row.signalId} skipped: ${row.reason}`);
    }
    const { summary } = report;
    console.info(
      `signals=${summary.count} wins=${summary.wins} losses=${summary.losses} expired=${summary.expired} ` +
        `winRate=${(summary.winRate * 100).toFixed(1)}% totalR=${summary.totalR} avgR=${summary.averageR}`,
    );
  } finally {
    await database.onModuleDestroy();
  }
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
