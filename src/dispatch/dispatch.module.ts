import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LedgerModule } from '../ledger/ledger.module';
import { StorageModule } from '../storage/storage.module';
import { NotificationModule } from '../notification/notification.module';
import { DispatcherService } from './dispatcher.service';
import { TriggerWriterService } from './trigger-writer.service';
import { PipelineRunner } from './pipeline/pipeline-runner';
import { SubprocessPipelineRunner } from './pipeline/subprocess-pipeline.runner';

/**
 * Dispatch module for handing new videos to the clip pipeline.
 *
 * @remarks
 * This module provides:
 * - Per-file download, staging and pipeline invocation via DispatcherService
 * - Trigger record and pipeline input layout via TriggerWriterService
 * - The pipeline itself behind the PipelineRunner token (a subprocess by default)
 */
@Module({
  imports: [ConfigModule, LedgerModule, StorageModule, NotificationModule],
  providers: [
    DispatcherService,
    TriggerWriterService,
    { provide: PipelineRunner, useClass: SubprocessPipelineRunner },
  ],
  exports: [DispatcherService],
})
export class DispatchModule {}
