import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedUnavailableError } from '@libs/core';
import { z } from 'zod';
import { toProviderInterval } from '../interval-mapper';
import { Candle } from '../types';
import { BaseRestCandleFeed } from './base-rest-candle-feed';
import { LatestPrice } from './candle-feed';

const BINANCE_MAX_LIMIT = 1000;

const klineSchema = z.array(z.union([z.string(), z.number()])).min(6);
const klinesSchema = z.array(klineSchema);
const tickerSchema = z.object({ symbol: z.string(), price: z.string() });

/** "BTC/USDT", "btc-usdt" -> "BTCUSDT". */
export const toBinanceSymbol = (asset: string): string =>
  asset.replace(/[^a-zA-Z0-9]/g, '').toUpperCase();

@Injectable()
export class BinanceCandleFeed extends BaseRestCandleFeed {
  readonly provider = 'binance';

  constructor(configService: ConfigService) {
    super(
      BinanceCandleFeed.name,
      configService.get<string>('BINANCE_BASE_URL', 'https://data-api.binance.vision'),
      configService,
    );
  }

  async fetchCandles(asset: string, timeframe: string, lookback: number): Promise<Candle[]> {
    const response = await this.request('fetch_candles', () =>
      this.http.get<unknown>('/api/v3/klines', {
        params: {
          symbol: toBinanceSymbol(asset),
          interval: toProviderInterval('binance', timeframe),
          limit: Math.min(Math.max(lookback, 1), BINANCE_MAX_LIMIT),
        },
      }),
    );

    const parsed = klinesSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new FeedUnavailableError(this.provider, `Unexpected klines payload for ${asset}`);
    }

    return parsed.data.map((item) => ({
      timestamp: Number(item[0]),
      open: Number(item[1]),
      high: Number(item[2]),
      low: Number(item[3]),
      close: Number(item[4]),
      volume: Number(item[5]),
    }));
  }

  async fetchLatestPrice(asset: string): Promise<LatestPrice> {
    const response = await this.request('fetch_price', () =>
      this.http.get<unknown>('/api/v3/ticker/price', {
        params: { symbol: toBinanceSymbol(asset) },
      }),
    );

    const parsed = tickerSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new FeedUnavailableError(this.provider, `Unexpected ticker payload for ${asset}`);
    }

    return { asset, price: Number(parsed.data.price), ts: Date.now() };
  }
}
