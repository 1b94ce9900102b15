import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { ArbitrageModule } from './arbitrage/arbitrage.module';
import { HealthController } from './health.controller';
import { NotificationsModule } from './notifications/notifications.module';

@Module({
  imports: [CoreModule, MarketDataModule, NotificationsModule, ArbitrageModule],
  controllers: [HealthController],
})
export class WorkerModule {}
