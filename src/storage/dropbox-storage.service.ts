import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Dropbox, DropboxAuth, files } from 'dropbox';
import { FolderListing, RemoteFile } from './interfaces/remote-file.interface';
import {
  StorageAuthError,
  StorageDownloadError,
  StorageListingError,
} from './storage.errors';

export interface ListFilesOptions {
  recursive: boolean;
}

/**
 * Service for reading the watched Dropbox folder.
 *
 * @remarks
 * **Design Decision: Refresh Token Preferred Over Access Token**
 *
 * When the refresh-token triple is configured, the SDK's `DropboxAuth`
 * holds short-lived access tokens and `ensureFreshToken` renews them before
 * each poll. A bare access token is used as-is and is never refreshed.
 *
 * **Design Decision: Team Namespace Support**
 *
 * `DROPBOX_SELECT_USER` and `DROPBOX_ROOT_NAMESPACE_ID` make the client act
 * as a team member inside the team root namespace, where shared team
 * folders live.
 */
@Injectable()
export class DropboxStorageService {
  private readonly logger = new Logger(DropboxStorageService.name);
  private readonly auth: DropboxAuth;
  private readonly client: Dropbox;
  private readonly canRefresh: boolean;

  constructor(private configService: ConfigService) {
    const refreshToken = this.configService.get<string>('DROPBOX_REFRESH_TOKEN');
    const accessToken = this.configService.get<string>('DROPBOX_ACCESS_TOKEN');
    this.canRefresh = Boolean(refreshToken);

    this.auth = new DropboxAuth(
      refreshToken
        ? {
            refreshToken,
            clientId: this.configService.get<string>('DROPBOX_APP_KEY'),
            clientSecret: this.configService.get<string>('DROPBOX_APP_SECRET'),
          }
        : { accessToken },
    );

    const selectUser = this.configService.get<string>('DROPBOX_SELECT_USER');
    const namespaceId = this.configService.get<string>('DROPBOX_ROOT_NAMESPACE_ID');

    this.client = new Dropbox({
      auth: this.auth,
      selectUser: selectUser || undefined,
      pathRoot: namespaceId
        ? JSON.stringify({ '.tag': 'namespace_id', namespace_id: namespaceId })
        : undefined,
    });
  }

  /**
   * Refresh the OAuth access token if it is missing or expired.
   *
   * @throws StorageAuthError if the refresh fails
   */
  async ensureFreshToken(): Promise<void> {
    if (!this.canRefresh) {
      return;
    }

    try {
      await this.auth.checkAndRefreshAccessToken();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new StorageAuthError(`Dropbox token refresh failed: ${message}`, error);
    }
  }

  /**
   * List every file in a folder, following pagination to the end.
   *
   * @param folder - Dropbox path of the folder
   * @returns File entries (folders and deleted entries are dropped) and the final cursor
   * @throws StorageAuthError on a 401, StorageListingError otherwise
   */
  async listFiles(folder: string, options: ListFilesOptions): Promise<FolderListing> {
    try {
      const collected: RemoteFile[] = [];

      let page = (
        await this.client.filesListFolder({
          path: folder,
          recursive: options.recursive,
          include_deleted: false,
        })
      ).result;
      this.collectFiles(page.entries, collected);

      while (page.has_more) {
        page = (await this.client.filesListFolderContinue({ cursor: page.cursor })).result;
        this.collectFiles(page.entries, collected);
      }

      this.logger.debug(`Listed ${collected.length} file(s) in ${folder}`);
      return { files: collected, cursor: page.cursor };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      if (isUnauthorized(error)) {
        throw new StorageAuthError(`Dropbox rejected credentials listing ${folder}: ${message}`, error);
      }
      throw new StorageListingError(`Failed to list ${folder}: ${message}`, error);
    }
  }

  /**
   * Download a file to a local path.
   *
   * @param remotePath - Dropbox path (or `id:` reference) of the file
   * @param destination - Local file path to write
   * @returns Number of bytes written
   * @throws StorageDownloadError if the download or the local write fails
   */
  async download(remotePath: string, destination: string): Promise<number> {
    this.logger.log(`Downloading ${remotePath}`);

    try {
      const { result } = await this.client.filesDownload({ path: remotePath });

      if (!('fileBinary' in result) || !Buffer.isBuffer(result.fileBinary)) {
        throw new Error(`Empty response body for ${remotePath}`);
      }

      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, result.fileBinary);

      this.logger.log(`Downloaded ${result.fileBinary.length} bytes to ${destination}`);
      return result.fileBinary.length;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to download ${remotePath}: ${message}`);
      throw new StorageDownloadError(`Download failed for ${remotePath}: ${message}`, error);
    }
  }

  private collectFiles(
    entries: files.ListFolderResult['entries'],
    collected: RemoteFile[],
  ): void {
    for (const entry of entries) {
      if (entry['.tag'] !== 'file') {
        continue;
      }
      collected.push({
        id: entry.id,
        name: entry.name,
        path: entry.path_display ?? entry.path_lower ?? entry.name,
        size: entry.size,
        clientModified: entry.client_modified,
      });
    }
  }
}

function isUnauthorized(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === 401;
}
