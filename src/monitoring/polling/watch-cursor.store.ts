import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { writeJsonAtomic } from '../../shared/utils/json-file';

/**
 * Progress marker of the polling source.
 */
export interface WatchCursor {
  /** ISO timestamp of the last successful listing */
  lastCheckedAt: string;

  /** Provider cursor returned by that listing */
  cursor: string;

  /** Number of file entries seen */
  entries: number;
}

/**
 * File-backed store for the {@link WatchCursor}. Only the poller uses it.
 */
@Injectable()
export class WatchCursorStore {
  private readonly filePath: string;

  constructor(private configService: ConfigService) {
    this.filePath = this.configService.get<string>('CURSOR_FILE') || './data/watch_cursor.json';
  }

  async save(cursor: WatchCursor): Promise<void> {
    await writeJsonAtomic(this.filePath, cursor);
  }
}
