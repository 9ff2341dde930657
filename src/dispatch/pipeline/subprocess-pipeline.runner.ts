import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChildProcess, spawn } from 'child_process';
import { PipelineJob, PipelineResult, PipelineRunner } from './pipeline-runner';

const TAIL_CHARS = 4096;
const KILL_GRACE_MS = 10_000;

function appendTail(current: string, chunk: Buffer | string): string {
  return (current + chunk.toString()).slice(-TAIL_CHARS);
}

/**
 * Pipeline runner that spawns `PIPELINE_COMMAND`.
 *
 * The command receives `PIPELINE_ARGS` followed by the input file path, runs
 * in `PIPELINE_WORKDIR`, and sees the trigger through `VIDEO_REMOTE_ID`,
 * `VIDEO_REMOTE_PATH` and `VIDEO_METADATA_FILE`. Exceeding
 * `PIPELINE_TIMEOUT_MINUTES` sends SIGTERM, then SIGKILL after a grace period.
 */
@Injectable()
export class SubprocessPipelineRunner extends PipelineRunner {
  private readonly logger = new Logger(SubprocessPipelineRunner.name);
  private readonly command: string;
  private readonly args: string[];
  private readonly workdir: string | undefined;
  private readonly timeoutMs: number;

  constructor(private configService: ConfigService) {
    super();
    this.command = this.configService.get<string>('PIPELINE_COMMAND') || 'python3';
    this.args = (this.configService.get<string>('PIPELINE_ARGS') || '')
      .split(/\s+/)
      .filter((arg) => arg.length > 0);
    this.workdir = this.configService.get<string>('PIPELINE_WORKDIR') || undefined;
    this.timeoutMs =
      (this.configService.get<number>('PIPELINE_TIMEOUT_MINUTES') || 120) * 60_000;
  }

  run(job: PipelineJob): Promise<PipelineResult> {
    const args = [...this.args, job.inputPath];
    const startedAt = Date.now();

    this.logger.log(
      `Starting pipeline for ${job.trigger.remoteId}: ${this.command} ${args.join(' ')}`,
    );

    return new Promise<PipelineResult>((resolve) => {
      let stdoutTail = '';
      let stderrTail = '';
      let timedOut = false;
      let settled = false;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (
        exitCode: number | null,
        signal: string | null,
        error?: Error,
      ): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);

        resolve({
          success: exitCode === 0 && !timedOut && error === undefined,
          exitCode,
          signal,
          timedOut,
          durationMs: Date.now() - startedAt,
          stdoutTail,
          stderrTail,
          error: error?.message,
        });
      };

      let child: ChildProcess;
      try {
        child = spawn(this.command, args, {
          cwd: this.workdir,
          env: {
            ...process.env,
            VIDEO_REMOTE_ID: job.trigger.remoteId,
            VIDEO_REMOTE_PATH: job.trigger.path,
            VIDEO_METADATA_FILE: job.metadataPath,
          },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        finish(null, null, error instanceof Error ? error : new Error(String(error)));
        return;
      }

      child.stdout?.on('data', (chunk: Buffer) => {
        stdoutTail = appendTail(stdoutTail, chunk);
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderrTail = appendTail(stderrTail, chunk);
      });
      child.on('error', (error) => finish(null, null, error));
      child.on('close', (code, signal) => finish(code, signal));

      timeoutTimer = setTimeout(() => {
        timedOut = true;
        this.logger.warn(
          `Pipeline for ${job.trigger.remoteId} exceeded ${this.timeoutMs / 60_000} minute(s), terminating`,
        );
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
        killTimer.unref();
      }, this.timeoutMs);
      timeoutTimer.unref();
    });
  }
}
