import { Module } from '@nestjs/common';
import { CANDLE_FEED } from './feeds/candle-feed';
import { BinanceCandleFeed } from './feeds/binance-candle-feed';
import { FeedRegistry } from './feeds/feed.registry';
import { TwelveDataCandleFeed } from './feeds/twelvedata-candle-feed';

@Module({
  providers: [
    TwelveDataCandleFeed,
    BinanceCandleFeed,
    FeedRegistry,
    {
      provide: CANDLE_FEED,
      useFactory: (registry: FeedRegistry) => registry.getActiveFeed(),
      inject: [FeedRegistry],
    },
  ],
  exports: [CANDLE_FEED, FeedRegistry],
})
export class MarketDataModule {}
