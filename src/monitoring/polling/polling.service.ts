import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { DropboxStorageService } from '../../storage/dropbox-storage.service';
import { DispatcherService } from '../../dispatch/dispatcher.service';
import { DispatchSummary } from '../../dispatch/interfaces/dispatch-result.interface';
import { ChangeDetectionService } from '../change-detection.service';
import { WatchCursorStore } from './watch-cursor.store';

export const POLL_INTERVAL_NAME = 'dropbox-poll';

/**
 * Service that checks the watch folder on a fixed interval.
 *
 * @remarks
 * **Design Decision: Dynamic Interval**
 *
 * The period comes from `POLL_INTERVAL_MINUTES`, so the interval is
 * registered with the `SchedulerRegistry` at bootstrap instead of through
 * the `@Interval` decorator.
 *
 * **Design Decision: Skip Overlapping Ticks**
 *
 * A tick that starts while the previous one is still dispatching returns
 * immediately. The guard covers the tick only; the ledger has its own lock.
 *
 * **Design Decision: Cursor Is Informational**
 *
 * The cursor file is written after every successful listing but is never
 * used to skip files. Deduplication is the ledger's job, so a file whose
 * pipeline failed is picked up again on the next tick.
 */
@Injectable()
export class PollingService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(PollingService.name);
  private readonly enabled: boolean;
  private readonly intervalMs: number;
  private readonly pollOnStartup: boolean;
  private isPolling = false;
  private lastPollAt: string | null = null;

  constructor(
    private configService: ConfigService,
    private schedulerRegistry: SchedulerRegistry,
    private storageService: DropboxStorageService,
    private changeDetectionService: ChangeDetectionService,
    private dispatcherService: DispatcherService,
    private cursorStore: WatchCursorStore,
  ) {
    const mode = this.configService.get<string>('MONITOR_MODE') || 'webhook';
    this.enabled = mode === 'polling' || mode === 'both';
    this.intervalMs = (this.configService.get<number>('POLL_INTERVAL_MINUTES') || 30) * 60_000;
    this.pollOnStartup = this.configService.get<boolean>('POLL_ON_STARTUP') !== false;
  }

  onApplicationBootstrap(): void {
    if (!this.enabled) {
      this.logger.log('Polling disabled for this monitor mode');
      return;
    }

    const interval = setInterval(() => this.runScheduled(), this.intervalMs);
    this.schedulerRegistry.addInterval(POLL_INTERVAL_NAME, interval);
    this.logger.log(
      `Polling ${this.changeDetectionService.getWatchFolder()} every ${this.intervalMs / 60_000} minute(s)`,
    );

    if (this.pollOnStartup) {
      this.runScheduled();
    }
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(POLL_INTERVAL_NAME);
    }
  }

  /** ISO timestamp of the last successful listing, or `null` before the first one. */
  getLastPollAt(): string | null {
    return this.lastPollAt;
  }

  /**
   * Run one poll cycle.
   *
   * @returns The dispatch summary, or `null` when the tick was skipped
   */
  async poll(): Promise<DispatchSummary | null> {
    if (this.isPolling) {
      this.logger.warn('Previous poll still running, skipping this tick');
      return null;
    }

    this.isPolling = true;

    try {
      await this.storageService.ensureFreshToken();

      const detection = await this.changeDetectionService.detectNewFiles();
      const checkedAt = new Date().toISOString();
      this.lastPollAt = checkedAt;

      try {
        await this.cursorStore.save({
          lastCheckedAt: checkedAt,
          cursor: detection.cursor,
          entries: detection.listed,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.warn(`Could not persist watch cursor: ${message}`);
      }

      if (detection.candidates.length === 0) {
        return { dispatched: 0, skipped: 0, failed: 0, results: [] };
      }
      return await this.dispatcherService.dispatch(detection.candidates, 'polling');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Poll failed, skipping this tick: ${message}`);
      return null;
    } finally {
      this.isPolling = false;
    }
  }

  private runScheduled(): void {
    this.poll().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Scheduled poll failed: ${message}`);
    });
  }
}
