import {
  BeforeApplicationShutdown,
  Injectable,
  Logger,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ProcessedLedgerService } from '../ledger/processed-ledger.service';
import { DropboxStorageService } from '../storage/dropbox-storage.service';
import { RemoteFile } from '../storage/interfaces/remote-file.interface';
import { SlackNotifierService } from '../notification/slack-notifier.service';
import {
  buildCompletionMessage,
  buildFailureMessage,
} from '../notification/notification-messages';
import { DiscoverySource } from './interfaces/trigger-record.interface';
import {
  DispatchOutcome,
  DispatchSummary,
  FileDispatchResult,
} from './interfaces/dispatch-result.interface';
import { PipelineRunner } from './pipeline/pipeline-runner';
import { PreparedTrigger, TriggerWriterService } from './trigger-writer.service';

const SKIPPED: ReadonlySet<DispatchOutcome> = new Set(['already_processed', 'in_flight']);

/**
 * Service that hands new files to the clip pipeline.
 *
 * @remarks
 * **Design Decision: Mark Only After Confirmed Success**
 *
 * A file enters the ledger only after the pipeline exits successfully.
 * Download failures, pipeline failures and interrupted runs leave it
 * unmarked, so the next poll or webhook delivery retries it.
 *
 * **Design Decision: Sequential, Per-File Isolation**
 *
 * Files are dispatched one at a time and every step of a file is guarded,
 * so one bad file never stops the rest of a batch.
 *
 * **Design Decision: Background Queue For Webhooks**
 *
 * Webhook deliveries must be acknowledged within a few seconds. `enqueue`
 * chains detection and dispatch onto a single background promise, so the
 * HTTP handler returns at once and bursts of notifications run one after
 * another instead of racing each other.
 */
@Injectable()
export class DispatcherService implements OnModuleInit, BeforeApplicationShutdown {
  private readonly logger = new Logger(DispatcherService.name);
  private readonly stagingDir: string;
  private readonly outputFolderUrl: string;
  private readonly notifyOnFailure: boolean;
  private readonly inFlight = new Set<string>();
  private backgroundQueue: Promise<void> = Promise.resolve();

  constructor(
    private configService: ConfigService,
    private ledgerService: ProcessedLedgerService,
    private storageService: DropboxStorageService,
    private triggerWriter: TriggerWriterService,
    private pipelineRunner: PipelineRunner,
    private notifier: SlackNotifierService,
  ) {
    this.stagingDir = path.resolve(
      this.configService.get<string>('STAGING_DIR') || './data/downloads',
    );
    this.outputFolderUrl = this.configService.get<string>('OUTPUT_FOLDER_URL') || '';
    this.notifyOnFailure = this.configService.get<boolean>('NOTIFY_ON_FAILURE') === true;
  }

  /**
   * Reset scratch space. Nothing in staging or in the pending trigger
   * directory survives a restart.
   */
  async onModuleInit(): Promise<void> {
    await fs.rm(this.stagingDir, { recursive: true, force: true });
    await fs.mkdir(this.stagingDir, { recursive: true });
    await this.triggerWriter.removeStaleTriggers();
    this.logger.log(`Staging directory ready at ${this.stagingDir}`);
  }

  async beforeApplicationShutdown(): Promise<void> {
    await this.drain();
  }

  /**
   * Run detection and dispatch in the background.
   *
   * @param source - Change source, recorded on trigger records
   * @param producer - Returns the candidates; errors are logged, not thrown
   */
  enqueue(source: DiscoverySource, producer: () => Promise<RemoteFile[]>): void {
    this.backgroundQueue = this.backgroundQueue.then(async () => {
      try {
        const files = await producer();
        if (files.length > 0) {
          await this.dispatch(files, source);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Background ${source} dispatch failed: ${message}`);
      }
    });
  }

  /** Resolves once all enqueued background work has finished. */
  drain(): Promise<void> {
    return this.backgroundQueue;
  }

  /**
   * Dispatch candidates one at a time.
   */
  async dispatch(files: readonly RemoteFile[], source: DiscoverySource): Promise<DispatchSummary> {
    const results: FileDispatchResult[] = [];

    for (const file of files) {
      try {
        results.push(await this.dispatchOne(file, source));
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Unexpected error dispatching ${file.id} (${file.path}): ${message}`);
        results.push({
          remoteId: file.id,
          path: file.path,
          outcome: 'unexpected_error',
          error: message,
        });
      }
    }

    const summary: DispatchSummary = {
      dispatched: results.filter((result) => result.outcome === 'processed').length,
      skipped: results.filter((result) => SKIPPED.has(result.outcome)).length,
      failed: 0,
      results,
    };
    summary.failed = results.length - summary.dispatched - summary.skipped;

    this.logger.log(
      `Dispatch (${source}) finished: ${summary.dispatched} processed, ` +
        `${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return summary;
  }

  private async dispatchOne(
    file: RemoteFile,
    source: DiscoverySource,
  ): Promise<FileDispatchResult> {
    const base = { remoteId: file.id, path: file.path };

    // Listing and dispatch are not atomic; another source may have finished this file since.
    if (this.ledgerService.hasProcessed(file.id)) {
      this.logger.debug(`Skipping ${file.id}: already processed`);
      return { ...base, outcome: 'already_processed' };
    }
    if (this.inFlight.has(file.id)) {
      this.logger.debug(`Skipping ${file.id}: already being dispatched`);
      return { ...base, outcome: 'in_flight' };
    }

    this.inFlight.add(file.id);
    const stagingPath = path.join(this.stagingDir, uuidv4(), path.basename(file.name));
    this.logger.log(`Dispatching ${file.name} (${file.id}) from ${source}`);

    try {
      try {
        await this.storageService.download(file.id, stagingPath);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Download failed for ${file.id} (${file.path}); will retry: ${message}`);
        return { ...base, outcome: 'download_failed', error: message };
      }

      let prepared: PreparedTrigger;
      try {
        prepared = await this.triggerWriter.prepare(file, source, stagingPath, new Date());
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Failed to stage ${file.id} (${file.path}) for the pipeline: ${message}`);
        return { ...base, outcome: 'trigger_failed', error: message };
      }

      const pipeline = await this.pipelineRunner.run(prepared.job);

      if (!pipeline.success) {
        this.logger.error(
          `Pipeline failed for ${file.id} (${file.path}): exit code ${pipeline.exitCode}, ` +
            `signal ${pipeline.signal}, timed out ${pipeline.timedOut}` +
            (pipeline.error ? `, error ${pipeline.error}` : '') +
            `; stderr: ${pipeline.stderrTail.trim() || '(empty)'}`,
        );
        await this.discardTrigger(prepared);
        if (this.notifyOnFailure) {
          await this.notifier.notify(
            this.notifier.getDefaultChannel(),
            buildFailureMessage(prepared.job.trigger, pipeline.exitCode, pipeline.timedOut),
          );
        }
        return { ...base, outcome: 'pipeline_failed', pipeline };
      }

      try {
        await this.ledgerService.markProcessed(file.id, file.path);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(
          `Pipeline succeeded for ${file.id} but the ledger could not be updated; it will be reprocessed: ${message}`,
        );
        await this.discardTrigger(prepared);
        return { ...base, outcome: 'ledger_failed', pipeline, error: message };
      }

      await this.archiveTrigger(prepared);

      const notified = await this.notifier.notify(
        this.notifier.getDefaultChannel(),
        buildCompletionMessage(prepared.job.trigger, this.outputFolderUrl),
      );
      if (!notified) {
        this.logger.warn(`Completion notice for ${file.id} was not delivered`);
      }

      this.logger.log(`Processed ${file.name} (${file.id}) in ${pipeline.durationMs} ms`);
      return { ...base, outcome: 'processed', pipeline, notified };
    } finally {
      this.inFlight.delete(file.id);
      await this.removeStaging(stagingPath);
    }
  }

  private async archiveTrigger(prepared: PreparedTrigger): Promise<void> {
    try {
      await this.triggerWriter.archive(prepared);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Could not archive ${prepared.triggerFile}: ${message}`);
    }
  }

  private async discardTrigger(prepared: PreparedTrigger): Promise<void> {
    try {
      await this.triggerWriter.discard(prepared);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Could not remove ${prepared.triggerFile}: ${message}`);
    }
  }

  private async removeStaging(stagingPath: string): Promise<void> {
    try {
      await fs.rm(path.dirname(stagingPath), { recursive: true, force: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Could not clean up ${stagingPath}: ${message}`);
    }
  }
}
