export * from './types';
export * from './candle-validation';
export * from './interval-mapper';
export * from './feeds/candle-feed';
export * from './feeds/base-rest-candle-feed';
export * from './feeds/twelvedata-candle-feed';
export * from './feeds/binance-candle-feed';
export * from './feeds/feed.registry';
export * from './utils/retry.util';
export * from './utils/http.util';
export * from './market-data.module';
