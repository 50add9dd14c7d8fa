import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedUnavailableError } from '@libs/core';
import { AxiosInstance } from 'axios';
import { Candle } from '../types';
import { createHttpClient, describeHttpError } from '../utils/http.util';
import { retry } from '../utils/retry.util';
import { CandleFeed, FeedSnapshot, LatestPrice } from './candle-feed';

export abstract class BaseRestCandleFeed implements CandleFeed {
  abstract readonly provider: string;

  protected readonly logger: Logger;
  protected readonly http: AxiosInstance;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;

  private failures = 0;
  private lastError: string | null = null;
  private lastSuccessAt: number | null = null;

  protected constructor(loggerContext: string, baseUrl: string, configService: ConfigService) {
    this.logger = new Logger(loggerContext);
    this.http = createHttpClient(baseUrl, configService.get<number>('FEED_TIMEOUT_MS', 10000));
    this.retryAttempts = configService.get<number>('FEED_RETRY_ATTEMPTS', 3);
    this.retryBaseDelayMs = configService.get<number>('FEED_RETRY_BASE_DELAY_MS', 500);
  }

  abstract fetchCandles(asset: string, timeframe: string, lookback: number): Promise<Candle[]>;
  abstract fetchLatestPrice(asset: string): Promise<LatestPrice>;

  getSnapshot(): FeedSnapshot {
    return {
      provider: this.provider,
      failures: this.failures,
      lastError: this.lastError,
      lastSuccessAt: this.lastSuccessAt,
    };
  }

  /** Retries transient transport failures, then rethrows as FeedUnavailableError. */
  protected async request<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await retry(fn, {
        attempts: this.retryAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            JSON.stringify({
              event: `${this.provider}_${operation}_retry`,
              provider: this.provider,
              attempt,
              delayMs,
              message: describeHttpError(error),
            }),
          );
        },
      });
      this.lastSuccessAt = Date.now();
      return result;
    } catch (error) {
      if (error instanceof FeedUnavailableError) {
        this.recordFailure(error.message);
        throw error;
      }
      const message = describeHttpError(error);
      this.recordFailure(message);
      throw new FeedUnavailableError(this.provider, `${operation} failed: ${message}`, {
        cause: error,
      });
    }
  }

  private recordFailure(message: string): void {
    this.failures += 1;
    this.lastError = message;
  }
}
