import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError, RedisService, withTimeout } from '@libs/core';

export const WATCHER_HEARTBEAT_KEY = 'watcher:heartbeat';

export interface TickSummary {
  tickAt: number;
  durationMs: number;
  processed: number;
  transitions: number;
  staleGuards: number;
  feedFailures: number;
  malformedCandles: number;
  errors: number;
  notified: number;
  notifyFailures: number;
}

export interface WatcherHealth {
  running: boolean;
  lastTickAt: number | null;
  lastSuccessfulTickAt: number | null;
  healthy: boolean;
  stalledForMs: number | null;
  lastTickSummary: TickSummary | null;
  lastError: string | null;
}

export type HeartbeatRedis = Pick<RedisService, 'set'>;

@Injectable()
export class WatcherHeartbeatService {
  private readonly logger = new Logger(WatcherHeartbeatService.name);
  private readonly stallMs: number;
  private readonly commandTimeoutMs: number;

  private startedAt: number | null = null;
  private lastTickAt: number | null = null;
  private lastSuccessfulTickAt: number | null = null;
  private lastTickSummary: TickSummary | null = null;
  private lastError: string | null = null;

  constructor(
    @Inject(RedisService) private readonly redis: HeartbeatRedis,
    configService: ConfigService,
  ) {
    this.stallMs = configService.get<number>('WATCHER_STALL_MINUTES', 5) * 60_000;
    this.commandTimeoutMs = configService.get<number>('REDIS_COMMAND_TIMEOUT_MS', 2000);
  }

  markStarted(now: number): void {
    this.startedAt = now;
  }

  markStopped(): void {
    this.startedAt = null;
  }

  async recordSuccess(summary: TickSummary): Promise<void> {
    this.lastTickAt = summary.tickAt;
    this.lastSuccessfulTickAt = summary.tickAt;
    this.lastTickSummary = summary;
    this.lastError = null;
    await this.mirror();
  }

  async recordFailure(at: number, message: string): Promise<void> {
    this.lastTickAt = at;
    this.lastError = message;
    await this.mirror();
  }

  /** Stalled once no tick has succeeded for the configured window since start. */
  getHealth(now: number): WatcherHealth {
    const running = this.startedAt !== null;
    const reference = this.lastSuccessfulTickAt ?? this.startedAt;
    const stalledForMs = reference === null ? null : Math.max(0, now - reference);

    return {
      running,
      lastTickAt: this.lastTickAt,
      lastSuccessfulTickAt: this.lastSuccessfulTickAt,
      healthy: running && stalledForMs !== null && stalledForMs < this.stallMs,
      stalledForMs,
      lastTickSummary: this.lastTickSummary,
      lastError: this.lastError,
    };
  }

  private async mirror(): Promise<void> {
    const payload = JSON.stringify({
      lastTickAt: this.lastTickAt,
      lastSuccessfulTickAt: this.lastSuccessfulTickAt,
      lastError: this.lastError,
      summary: this.lastTickSummary,
    });
    try {
      await withTimeout(
        this.redis.set(WATCHER_HEARTBEAT_KEY, payload, 'EX', Math.ceil((this.stallMs * 2) / 1000)),
        this.commandTimeoutMs,
        'heartbeat mirror',
      );
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'heartbeat_mirror_failed', message: describeError(error) }));
    }
  }
}
