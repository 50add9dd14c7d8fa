import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedUnavailableError } from '@libs/core';
import { z } from 'zod';
import { toProviderInterval } from '../interval-mapper';
import { Candle } from '../types';
import { BaseRestCandleFeed } from './base-rest-candle-feed';
import { LatestPrice } from './candle-feed';

const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v));

const timeSeriesValueSchema = z.object({
  datetime: z.string(),
  open: numeric,
  high: numeric,
  low: numeric,
  close: numeric,
  volume: numeric.optional(),
});

const timeSeriesSchema = z.union([
  z.object({ status: z.literal('error'), code: z.number().optional(), message: z.string() }),
  z.object({ status: z.string().optional(), values: z.array(timeSeriesValueSchema).default([]) }),
]);

const priceSchema = z.union([
  z.object({ status: z.literal('error'), code: z.number().optional(), message: z.string() }),
  z.object({ price: numeric }),
]);

/** TwelveData datetimes are exchange-naive; requests pin timezone=UTC. */
export const parseTwelveDataDatetime = (value: string): number | null => {
  const trimmed = value.trim();
  const iso = /^\d{4}-\d{2}-\d{2}$/.test(trimmed)
    ? `${trimmed}T00:00:00Z`
    : `${trimmed.replace(' ', 'T')}Z`;
  const ts = Date.parse(iso);
  return Number.isFinite(ts) ? ts : null;
};

@Injectable()
export class TwelveDataCandleFeed extends BaseRestCandleFeed {
  readonly provider = 'twelvedata';
  private readonly apiKey: string;

  constructor(configService: ConfigService) {
    super(
      TwelveDataCandleFeed.name,
      configService.get<string>('TWELVEDATA_REST_URL', 'https://api.twelvedata.com'),
      configService,
    );
    this.apiKey = configService.get<string>('TWELVEDATA_API_KEY', '');
  }

  async fetchCandles(asset: string, timeframe: string, lookback: number): Promise<Candle[]> {
    const response = await this.request('fetch_candles', () =>
      this.http.get<unknown>('/time_series', {
        params: {
          symbol: asset,
          interval: toProviderInterval('twelvedata', timeframe),
          outputsize: lookback,
          timezone: 'UTC',
          apikey: this.apiKey,
        },
      }),
    );

    const parsed = timeSeriesSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new FeedUnavailableError(this.provider, `Unexpected time_series payload for ${asset}`);
    }
    if ('message' in parsed.data) {
      throw new FeedUnavailableError(this.provider, parsed.data.message);
    }

    const candles: Candle[] = [];
    for (const value of parsed.data.values) {
      const timestamp = parseTwelveDataDatetime(value.datetime);
      if (timestamp === null) continue;
      candles.push({
        timestamp,
        open: value.open,
        high: value.high,
        low: value.low,
        close: value.close,
        volume: value.volume ?? 0,
      });
    }

    // newest first on the wire
    return candles.sort((a, b) => a.timestamp - b.timestamp);
  }

  async fetchLatestPrice(asset: string): Promise<LatestPrice> {
    const response = await this.request('fetch_price', () =>
      this.http.get<unknown>('/price', { params: { symbol: asset, apikey: this.apiKey } }),
    );

    const parsed = priceSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new FeedUnavailableError(this.provider, `Unexpected price payload for ${asset}`);
    }
    if ('message' in parsed.data) {
      throw new FeedUnavailableError(this.provider, parsed.data.message);
    }

    return { asset, price: parsed.data.price, ts: Date.now() };
  }
}
