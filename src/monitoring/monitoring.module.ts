import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageModule } from '../storage/storage.module';
import { LedgerModule } from '../ledger/ledger.module';
import { DispatchModule } from '../dispatch/dispatch.module';
import { ChangeDetectionService } from './change-detection.service';
import { WebhookController } from './webhook/webhook.controller';
import { WebhookService } from './webhook/webhook.service';
import { PollingService } from './polling/polling.service';
import { WatchCursorStore } from './polling/watch-cursor.store';

/**
 * Change sources for the watch folder: the Dropbox webhook and the poller.
 *
 * Both are always registered; `MONITOR_MODE` decides which of them act.
 */
@Module({
  imports: [ConfigModule, StorageModule, LedgerModule, DispatchModule],
  controllers: [WebhookController],
  providers: [ChangeDetectionService, WebhookService, PollingService, WatchCursorStore],
  exports: [PollingService, ChangeDetectionService],
})
export class MonitoringModule {}
