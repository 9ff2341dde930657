import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { writeJsonAtomic } from '../shared/utils/json-file';
import { RemoteFile } from '../storage/interfaces/remote-file.interface';
import { DiscoverySource, TriggerRecord } from './interfaces/trigger-record.interface';
import { PipelineJob } from './pipeline/pipeline-runner';

export interface PreparedTrigger {
  job: PipelineJob;

  /** Location of the trigger record JSON */
  triggerFile: string;
}

/** Remote id reduced to characters that are safe in a file name. */
export function safeRemoteId(remoteId: string): string {
  return remoteId.replace(/[^A-Za-z0-9_-]/g, '_');
}

export function triggerFileName(remoteId: string): string {
  return `file_${safeRemoteId(remoteId)}.json`;
}

/**
 * Writes trigger records and stages input for the pipeline.
 *
 * Layout:
 * - `TRIGGER_DIR/file_<id>.json` while a file is being dispatched
 * - `TRIGGER_DIR/processed/file_<id>.json` after a successful run
 * - `PIPELINE_INPUT_DIR/<id>/<name>` and `<name>.metadata.json` for the
 *   pipeline, removed once the run is over
 */
@Injectable()
export class TriggerWriterService {
  private readonly logger = new Logger(TriggerWriterService.name);
  private readonly triggerDir: string;
  private readonly inputDir: string;

  constructor(private configService: ConfigService) {
    this.triggerDir = path.resolve(
      this.configService.get<string>('TRIGGER_DIR') || './data/triggers',
    );
    this.inputDir = path.resolve(
      this.configService.get<string>('PIPELINE_INPUT_DIR') || './data/pipeline-input',
    );
  }

  /**
   * Remove trigger records left behind by an interrupted run.
   *
   * Their files were never marked processed, so they are rediscovered.
   *
   * @returns Number of records removed
   */
  async removeStaleTriggers(): Promise<number> {
    await fs.mkdir(this.triggerDir, { recursive: true });
    const entries = await fs.readdir(this.triggerDir, { withFileTypes: true });
    const stale = entries.filter((entry) => entry.isFile() && entry.name.endsWith('.json'));

    for (const entry of stale) {
      await fs.rm(path.join(this.triggerDir, entry.name), { force: true });
    }

    if (stale.length > 0) {
      this.logger.warn(
        `Removed ${stale.length} trigger record(s) from an interrupted run; those files will be retried`,
      );
    }
    return stale.length;
  }

  /**
   * Copy the staged video into the pipeline input directory and write its
   * metadata and trigger record.
   */
  async prepare(
    file: RemoteFile,
    source: DiscoverySource,
    localDownloadPath: string,
    discoveredAt: Date,
  ): Promise<PreparedTrigger> {
    const trigger: TriggerRecord = {
      remoteId: file.id,
      path: file.path,
      name: file.name,
      size: file.size,
      clientModified: file.clientModified,
      localDownloadPath,
      discoveredAt: discoveredAt.toISOString(),
      source,
    };

    // One directory per remote id: files with the same name never collide
    const jobDir = path.join(this.inputDir, safeRemoteId(file.id));
    await fs.mkdir(jobDir, { recursive: true });
    const inputPath = path.join(jobDir, path.basename(file.name));
    const metadataPath = `${inputPath}.metadata.json`;

    await fs.copyFile(localDownloadPath, inputPath);
    await writeJsonAtomic(metadataPath, trigger);

    const triggerFile = path.join(this.triggerDir, triggerFileName(file.id));
    await writeJsonAtomic(triggerFile, trigger);

    this.logger.log(`Created trigger record ${triggerFile}`);
    return { job: { inputPath, metadataPath, trigger }, triggerFile };
  }

  /**
   * Move a trigger record into `processed/` after a successful run and
   * remove the pipeline input.
   */
  async archive(prepared: PreparedTrigger): Promise<void> {
    const archiveDir = path.join(this.triggerDir, 'processed');
    await fs.mkdir(archiveDir, { recursive: true });
    await fs.rename(
      prepared.triggerFile,
      path.join(archiveDir, path.basename(prepared.triggerFile)),
    );
    await this.removeInput(prepared);
  }

  /**
   * Drop a trigger record and the pipeline input after a failed run, so the
   * next attempt starts clean.
   */
  async discard(prepared: PreparedTrigger): Promise<void> {
    await Promise.all([
      fs.rm(prepared.triggerFile, { force: true }),
      this.removeInput(prepared),
    ]);
  }

  private async removeInput(prepared: PreparedTrigger): Promise<void> {
    await fs.rm(path.dirname(prepared.job.inputPath), { recursive: true, force: true });
  }
}
