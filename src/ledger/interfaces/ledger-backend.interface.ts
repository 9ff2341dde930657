import { LedgerSnapshot } from './processed-file-record.interface';

/** Injection token for the active {@link LedgerBackend}. */
export const LEDGER_BACKEND = Symbol('LEDGER_BACKEND');

/**
 * Persistence port for the dedup ledger.
 */
export interface LedgerBackend {
  /**
   * Load the full ledger.
   *
   * @returns An empty snapshot when nothing has been persisted yet
   * @throws Error when stored data exists but cannot be read or parsed
   */
  load(): Promise<LedgerSnapshot>;

  /** Replace the persisted ledger with `snapshot`. */
  save(snapshot: LedgerSnapshot): Promise<void>;

  /** Human-readable location, used in logs. */
  describe(): string;
}
