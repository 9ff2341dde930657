import { readJsonFile, writeJsonAtomic } from '../../shared/utils/json-file';
import { LedgerBackend } from '../interfaces/ledger-backend.interface';
import {
  LedgerSnapshot,
  ProcessedFileRecord,
} from '../interfaces/processed-file-record.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/**
 * Ledger persisted as one pretty-printed JSON object keyed by remote id.
 *
 * @remarks
 * Also reads the older layout, a bare JSON array of ids, and upgrades it on
 * the next save. Records are normalised so hand-edited entries such as
 * `{"id:abc": {}}` still count as processed.
 */
export class JsonFileLedgerBackend implements LedgerBackend {
  constructor(private readonly filePath: string) {}

  async load(): Promise<LedgerSnapshot> {
    const parsed = await readJsonFile(this.filePath);
    if (parsed === null) {
      return {};
    }

    const loadedAt = new Date().toISOString();
    const snapshot: LedgerSnapshot = {};

    if (Array.isArray(parsed)) {
      for (const id of parsed) {
        if (typeof id === 'string' && id.length > 0) {
          snapshot[id] = { remoteId: id, path: '', processedAt: loadedAt };
        }
      }
      return snapshot;
    }

    if (!isRecord(parsed)) {
      throw new Error(`Unrecognised ledger format in ${this.filePath}`);
    }

    for (const [remoteId, entry] of Object.entries(parsed)) {
      const fields = isRecord(entry) ? entry : {};
      const record: ProcessedFileRecord = {
        remoteId,
        path: stringField(fields, 'path') ?? '',
        processedAt: stringField(fields, 'processedAt', 'processed_at') ?? loadedAt,
      };
      snapshot[remoteId] = record;
    }

    return snapshot;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    await writeJsonAtomic(this.filePath, snapshot);
  }

  describe(): string {
    return this.filePath;
  }
}
