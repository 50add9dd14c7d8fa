import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BaseRestCandleFeed } from './base-rest-candle-feed';
import { BinanceCandleFeed } from './binance-candle-feed';
import { TwelveDataCandleFeed } from './twelvedata-candle-feed';

type CandleProvider = 'TWELVEDATA' | 'BINANCE';

const isCandleProvider = (value: string): value is CandleProvider =>
  value === 'TWELVEDATA' || value === 'BINANCE';

@Injectable()
export class FeedRegistry {
  constructor(
    private readonly configService: ConfigService,
    private readonly twelveDataCandleFeed: TwelveDataCandleFeed,
    private readonly binanceCandleFeed: BinanceCandleFeed,
  ) {}

  getActiveFeed(): BaseRestCandleFeed {
    const provider = this.configService.get<string>('CANDLE_PROVIDER', 'TWELVEDATA').toUpperCase();
    if (!isCandleProvider(provider)) {
      throw new Error(`Unsupported candle provider ${provider}`);
    }

    switch (provider) {
      case 'TWELVEDATA':
        return this.twelveDataCandleFeed;
      case 'BINANCE':
        return this.binanceCandleFeed;
    }
  }
}
