import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DropboxStorageService } from '../storage/dropbox-storage.service';
import { RemoteFile } from '../storage/interfaces/remote-file.interface';
import { ProcessedLedgerService } from '../ledger/processed-ledger.service';
import { selectCandidates } from './candidate-filter';

export interface DetectionResult {
  /** Unprocessed video files, in listing order */
  candidates: RemoteFile[];

  /** Provider cursor after the listing */
  cursor: string;

  /** Number of file entries in the listing before filtering */
  listed: number;
}

/**
 * Lists the watch folder and selects new video files.
 *
 * Both change sources go through here so they see the folder the same way
 * (same path, same recursion, same filter).
 */
@Injectable()
export class ChangeDetectionService {
  private readonly logger = new Logger(ChangeDetectionService.name);
  private readonly watchFolder: string;
  private readonly recursive: boolean;

  constructor(
    private configService: ConfigService,
    private storageService: DropboxStorageService,
    private ledgerService: ProcessedLedgerService,
  ) {
    this.watchFolder =
      this.configService.get<string>('DROPBOX_WATCH_FOLDER') || '/Video Content/Final Cuts';
    this.recursive = this.configService.get<boolean>('DROPBOX_RECURSIVE') === true;
  }

  getWatchFolder(): string {
    return this.watchFolder;
  }

  /**
   * @throws StorageAuthError or StorageListingError when the folder cannot be listed
   */
  async detectNewFiles(): Promise<DetectionResult> {
    const listing = await this.storageService.listFiles(this.watchFolder, {
      recursive: this.recursive,
    });

    const candidates = selectCandidates(listing.files, this.ledgerService);

    if (candidates.length > 0) {
      this.logger.log(
        `Found ${candidates.length} new video file(s) in ${this.watchFolder}: ` +
          candidates.map((file) => file.name).join(', '),
      );
    } else {
      this.logger.log(`No new video files in ${this.watchFolder}`);
    }

    return { candidates, cursor: listing.cursor, listed: listing.files.length };
  }
}
