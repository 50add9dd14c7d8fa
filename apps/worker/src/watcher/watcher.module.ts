import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { SignalsModule } from '@libs/signals';
import { SignalWatcherService } from './signal-watcher.service';
import { WatcherHeartbeatService } from './watcher-heartbeat.service';

@Module({
  imports: [CoreModule, MarketDataModule, SignalsModule],
  providers: [SignalWatcherService, WatcherHeartbeatService],
  exports: [SignalWatcherService, WatcherHeartbeatService],
})
export class WatcherModule {}
