import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { BullModule } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { CoreModule, createQueueConnection } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { SignalsModule } from '@libs/signals';
import { StructureModule } from '@libs/structure';
import { HealthController } from './health.controller';
import { JanitorCron } from './janitor/janitor.cron';
import { WatcherModule } from './watcher/watcher.module';

@Module({
  imports: [
    CoreModule,
    MarketDataModule,
    SignalsModule,
    StructureModule,
    WatcherModule,
    ScheduleModule.forRoot(),
    BullModule.forRootAsync({
      imports: [CoreModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: createQueueConnection(configService),
      }),
    }),
  ],
  controllers: [HealthController],
  providers: [JanitorCron],
})
export class WorkerModule {}
