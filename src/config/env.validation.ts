import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const MONITOR_MODES = ['webhook', 'polling', 'both'] as const;
export type MonitorMode = (typeof MONITOR_MODES)[number];

export const LEDGER_BACKENDS = ['file', 'memory'] as const;
export type LedgerBackendKind = (typeof LEDGER_BACKENDS)[number];

/** Largest whole number of minutes Node timers accept (2^31 - 1 ms). */
export const MAX_TIMER_MINUTES = 35791;

function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  return ['true', '1', 'yes'].includes(String(value).trim().toLowerCase());
}

/**
 * Environment variables accepted by the monitor.
 *
 * @remarks
 * Defaults live on the property initializers so that `ConfigService.get`
 * always returns a value for the keys that have one.
 */
export class EnvironmentVariables {
  @IsString()
  HOST = '127.0.0.1';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 8080;

  @IsIn(MONITOR_MODES)
  MONITOR_MODE: MonitorMode = 'webhook';

  @IsOptional()
  @IsString()
  DROPBOX_ACCESS_TOKEN?: string;

  @IsOptional()
  @IsString()
  DROPBOX_REFRESH_TOKEN?: string;

  @IsOptional()
  @IsString()
  DROPBOX_APP_KEY?: string;

  @IsOptional()
  @IsString()
  DROPBOX_APP_SECRET?: string;

  /** Team member id to act as, for Dropbox Business accounts. */
  @IsOptional()
  @IsString()
  DROPBOX_SELECT_USER?: string;

  @IsOptional()
  @IsString()
  DROPBOX_ROOT_NAMESPACE_ID?: string;

  @IsString()
  DROPBOX_WATCH_FOLDER = '/Video Content/Final Cuts';

  @Transform(({ obj, key }) => toBoolean(obj[key]))
  DROPBOX_RECURSIVE = false;

  /** App secret used to sign webhook notifications. Unset disables verification. */
  @IsOptional()
  @IsString()
  DROPBOX_WEBHOOK_SECRET?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_TIMER_MINUTES)
  POLL_INTERVAL_MINUTES = 30;

  @Transform(({ obj, key }) => toBoolean(obj[key]))
  POLL_ON_STARTUP = true;

  @IsIn(LEDGER_BACKENDS)
  LEDGER_BACKEND: LedgerBackendKind = 'file';

  @IsString()
  LEDGER_FILE = './data/processed_files.json';

  @IsString()
  CURSOR_FILE = './data/watch_cursor.json';

  @IsString()
  STAGING_DIR = './data/downloads';

  @IsString()
  TRIGGER_DIR = './data/triggers';

  @IsString()
  PIPELINE_INPUT_DIR = './data/pipeline-input';

  @IsString()
  PIPELINE_COMMAND = 'python3';

  @IsString()
  PIPELINE_ARGS = '';

  @IsOptional()
  @IsString()
  PIPELINE_WORKDIR?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_TIMER_MINUTES)
  PIPELINE_TIMEOUT_MINUTES = 120;

  @IsOptional()
  @IsString()
  SLACK_BOT_TOKEN?: string;

  @IsString()
  SLACK_CHANNEL = '#video-notifications';

  @Transform(({ obj, key }) => toBoolean(obj[key]))
  NOTIFY_ON_FAILURE = false;

  @IsUrl({ require_tld: false })
  OUTPUT_FOLDER_URL!: string;
}

function hasValue(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Validate raw environment variables for `ConfigModule.forRoot({ validate })`.
 *
 * @throws Error listing every invalid key, or the missing Dropbox credentials
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  const problems = errors.map(
    (error) =>
      `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
  );

  const hasAccessToken = hasValue(validatedConfig.DROPBOX_ACCESS_TOKEN);
  const hasRefreshTriple =
    hasValue(validatedConfig.DROPBOX_REFRESH_TOKEN) &&
    hasValue(validatedConfig.DROPBOX_APP_KEY) &&
    hasValue(validatedConfig.DROPBOX_APP_SECRET);

  if (!hasAccessToken && !hasRefreshTriple) {
    problems.push(
      'DROPBOX_ACCESS_TOKEN or (DROPBOX_REFRESH_TOKEN, DROPBOX_APP_KEY, DROPBOX_APP_SECRET) must be provided',
    );
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment configuration:\n- ${problems.join('\n- ')}`);
  }

  return validatedConfig;
}
