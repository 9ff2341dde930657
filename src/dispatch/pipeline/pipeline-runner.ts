import { TriggerRecord } from '../interfaces/trigger-record.interface';

/**
 * One unit of work for the downstream clip pipeline.
 */
export interface PipelineJob {
  /** Copy of the video inside the pipeline input directory */
  inputPath: string;

  /** Metadata JSON written beside the input copy */
  metadataPath: string;

  trigger: TriggerRecord;
}

/**
 * Completion signal from the pipeline.
 */
export interface PipelineResult {
  success: boolean;

  /** Process exit code, `null` when killed by a signal or never started */
  exitCode: number | null;

  signal: string | null;

  timedOut: boolean;

  durationMs: number;

  /** Last few KiB of standard output */
  stdoutTail: string;

  /** Last few KiB of standard error */
  stderrTail: string;

  /** Set when the pipeline could not be started at all */
  error?: string;
}

/**
 * Runs the downstream pipeline as an isolated unit of work.
 *
 * @remarks
 * Implementations resolve with `success: false` for every pipeline-side
 * failure (non-zero exit, crash, timeout, missing executable) so the
 * dispatcher handles one shape of failure.
 */
export abstract class PipelineRunner {
  abstract run(job: PipelineJob): Promise<PipelineResult>;
}
