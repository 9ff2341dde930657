import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  LEDGER_BACKEND,
  LedgerBackend,
} from './interfaces/ledger-backend.interface';
import {
  LedgerSnapshot,
  ProcessedFileRecord,
} from './interfaces/processed-file-record.interface';

/**
 * Dedup ledger of files already handed to the pipeline.
 *
 * @remarks
 * **Design Decision: Whole Ledger In Memory**
 *
 * The ledger is read once at startup and every mutation rewrites the whole
 * snapshot through the backend. Reads never touch the disk.
 *
 * **Design Decision: In-Process Mutex Around Mutations**
 *
 * Mutations run one at a time on a promise chain. Only the point write is
 * serialised; callers never hold the lock across a download or a pipeline
 * run. A second process writing the same ledger file is not supported.
 *
 * **Design Decision: Append-Only**
 *
 * Records are never updated or removed. Marking an id twice keeps the first
 * record.
 */
@Injectable()
export class ProcessedLedgerService implements OnModuleInit {
  private readonly logger = new Logger(ProcessedLedgerService.name);
  private readonly records = new Map<string, ProcessedFileRecord>();
  private mutationQueue: Promise<void> = Promise.resolve();

  constructor(@Inject(LEDGER_BACKEND) private readonly backend: LedgerBackend) {}

  /**
   * Load the persisted ledger.
   *
   * A missing ledger starts empty. An unreadable one also starts empty, with
   * a warning: losing the ledger only risks reprocessing files.
   */
  async onModuleInit(): Promise<void> {
    let snapshot: LedgerSnapshot;
    try {
      snapshot = await this.backend.load();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `Ledger at ${this.backend.describe()} could not be read (${message}). ` +
          'Starting with an empty ledger; previously processed files may be dispatched again.',
      );
      snapshot = {};
    }

    this.records.clear();
    for (const [remoteId, record] of Object.entries(snapshot)) {
      this.records.set(remoteId, record);
    }

    this.logger.log(
      `Loaded ${this.records.size} processed file record(s) from ${this.backend.describe()}`,
    );
  }

  hasProcessed(remoteId: string): boolean {
    return this.records.has(remoteId);
  }

  get(remoteId: string): ProcessedFileRecord | undefined {
    return this.records.get(remoteId);
  }

  count(): number {
    return this.records.size;
  }

  /**
   * Record a successful hand-off and persist the ledger.
   *
   * Idempotent: an id that is already present is left untouched.
   *
   * @throws Error if the backend fails to persist; the in-memory entry is rolled back
   */
  async markProcessed(
    remoteId: string,
    path: string,
    processedAt: Date = new Date(),
  ): Promise<void> {
    await this.runExclusive(async () => {
      if (this.records.has(remoteId)) {
        this.logger.debug(`Ledger already contains ${remoteId}`);
        return;
      }

      this.records.set(remoteId, {
        remoteId,
        path,
        processedAt: processedAt.toISOString(),
      });

      try {
        await this.backend.save(this.snapshot());
      } catch (error) {
        this.records.delete(remoteId);
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Failed to persist ledger entry for ${remoteId}: ${message}`);
        throw error;
      }

      this.logger.log(`Marked ${remoteId} (${path}) as processed`);
    });
  }

  private snapshot(): LedgerSnapshot {
    return Object.fromEntries(this.records);
  }

  private runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutationQueue.then(task);
    this.mutationQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
