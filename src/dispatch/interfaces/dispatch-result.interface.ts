import { PipelineResult } from '../pipeline/pipeline-runner';

export type DispatchOutcome =
  | 'processed'
  | 'already_processed'
  | 'in_flight'
  | 'download_failed'
  | 'trigger_failed'
  | 'pipeline_failed'
  | 'ledger_failed'
  | 'unexpected_error';

/**
 * Outcome for one candidate file.
 */
export interface FileDispatchResult {
  remoteId: string;
  path: string;
  outcome: DispatchOutcome;

  /** Present once the pipeline has run */
  pipeline?: PipelineResult;

  /** Whether the completion notice was delivered (processed files only) */
  notified?: boolean;

  error?: string;
}

/**
 * Outcome for a batch of candidates.
 */
export interface DispatchSummary {
  /** Files the pipeline processed and the ledger recorded */
  dispatched: number;

  /** Files skipped because they were already processed or in flight */
  skipped: number;

  /** Files left unmarked for retry */
  failed: number;

  results: FileDispatchResult[];
}
