import { LedgerBackend } from '../interfaces/ledger-backend.interface';
import { LedgerSnapshot } from '../interfaces/processed-file-record.interface';

/**
 * Non-durable ledger. Used by tests and by `LEDGER_BACKEND=memory`.
 */
export class InMemoryLedgerBackend implements LedgerBackend {
  private stored: LedgerSnapshot;
  saveCount = 0;

  constructor(initial: LedgerSnapshot = {}) {
    this.stored = { ...initial };
  }

  async load(): Promise<LedgerSnapshot> {
    return { ...this.stored };
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.stored = { ...snapshot };
    this.saveCount += 1;
  }

  describe(): string {
    return 'memory';
  }
}
