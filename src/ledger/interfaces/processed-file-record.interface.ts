/**
 * Entry in the dedup ledger.
 *
 * @remarks
 * Presence of a record means the file was handed to the pipeline and the
 * pipeline reported success. It never means "in progress".
 */
export interface ProcessedFileRecord {
  /** Provider-assigned file id, unique within the ledger */
  remoteId: string;

  /** Last known path of the file when it was processed */
  path: string;

  /** ISO timestamp of the successful hand-off */
  processedAt: string;
}

/** Ledger contents keyed by remote id. */
export type LedgerSnapshot = Record<string, ProcessedFileRecord>;
