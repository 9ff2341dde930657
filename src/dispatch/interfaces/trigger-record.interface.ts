/** Which change source discovered a file. */
export type DiscoverySource = 'webhook' | 'polling';

/**
 * Metadata handed to the pipeline alongside a copy of the video.
 *
 * @remarks
 * Written to the trigger directory when dispatch starts, archived after a
 * successful run and deleted after a failed one.
 */
export interface TriggerRecord {
  remoteId: string;

  /** Dropbox display path of the source video */
  path: string;

  /** File name, used for the copy in the pipeline input directory */
  name: string;

  /** Size in bytes */
  size: number;

  clientModified?: string;

  /** Where the bytes were staged locally */
  localDownloadPath: string;

  /** ISO timestamp of when the dispatcher picked the file up */
  discoveredAt: string;

  source: DiscoverySource;
}
