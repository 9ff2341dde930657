import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LedgerModule } from '../ledger/ledger.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { HealthController } from './health.controller';

@Module({
  imports: [ConfigModule, LedgerModule, MonitoringModule],
  controllers: [HealthController],
})
export class HealthModule {}
