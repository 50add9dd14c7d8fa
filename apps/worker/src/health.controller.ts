import { Controller, Get, HttpException, HttpStatus, Inject, Param } from '@nestjs/common';
import { describeError } from '@libs/core';
import { CANDLE_FEED, CandleFeed, LatestPrice } from '@libs/market-data';
import { StructureEngine, StructureEngineDescription } from '@libs/structure';
import { WatcherHealth, WatcherHeartbeatService } from './watcher/watcher-heartbeat.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly heartbeat: WatcherHeartbeatService,
    private readonly structureEngine: StructureEngine,
    @Inject(CANDLE_FEED) private readonly feed: CandleFeed,
  ) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('watcher')
  watcher(): { ok: true } & WatcherHealth {
    const health = this.heartbeat.getHealth(Date.now());
    if (!health.healthy) {
      throw new HttpException({ ok: false, ...health }, HttpStatus.SERVICE_UNAVAILABLE);
    }
    return { ok: true, ...health };
  }

  @Get('structure')
  structure(): { ok: true } & StructureEngineDescription {
    return { ok: true, ...this.structureEngine.describeEngine() };
  }

  @Get('feed/:asset')
  async feedPrice(@Param('asset') asset: string): Promise<{ ok: true; provider: string } & LatestPrice> {
    try {
      const latest = await this.feed.fetchLatestPrice(asset);
      return { ok: true, provider: this.feed.provider, ...latest };
    } catch (error) {
      throw new HttpException(
        { ok: false, provider: this.feed.provider, asset, message: describeError(error) },
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    }
  }
}
