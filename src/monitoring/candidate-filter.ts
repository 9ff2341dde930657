import * as path from 'path';
import { RemoteFile } from '../storage/interfaces/remote-file.interface';
import { ProcessedLedgerService } from '../ledger/processed-ledger.service';

/** Extensions (lower case, without the dot) treated as video uploads. */
export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  'mp4',
  'mov',
  'avi',
  'mkv',
  'webm',
  'flv',
  'm4v',
]);

export function isVideoFile(fileName: string): boolean {
  const extension = path.extname(fileName).slice(1).toLowerCase();
  return VIDEO_EXTENSIONS.has(extension);
}

/**
 * Pick the files that should be dispatched from a folder listing.
 *
 * Shared by the webhook and polling sources: keeps video files whose id is
 * not in the ledger, first occurrence winning when one listing repeats an id.
 */
export function selectCandidates(
  files: readonly RemoteFile[],
  ledger: Pick<ProcessedLedgerService, 'hasProcessed'>,
): RemoteFile[] {
  const seen = new Set<string>();
  const candidates: RemoteFile[] = [];

  for (const file of files) {
    if (!isVideoFile(file.name) || ledger.hasProcessed(file.id) || seen.has(file.id)) {
      continue;
    }
    seen.add(file.id);
    candidates.push(file);
  }

  return candidates;
}
