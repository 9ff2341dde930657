import { TriggerRecord } from '../dispatch/interfaces/trigger-record.interface';

/** Escape the three characters Slack reserves in mrkdwn text. */
export function escapeSlackText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function slackLink(url: string, label: string): string {
  return `<${url}|${escapeSlackText(label)}>`;
}

function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(1);
}

export function buildCompletionMessage(trigger: TriggerRecord, outputFolderUrl: string): string {
  return [
    ':white_check_mark: New video file processed successfully!',
    '',
    `*File:* ${escapeSlackText(trigger.name)}`,
    `*Source:* Dropbox - ${escapeSlackText(trigger.path)}`,
    `*Size:* ${formatMegabytes(trigger.size)} MB`,
    '',
    ':file_folder: *Clips uploaded to Dropbox:*',
    slackLink(outputFolderUrl, 'Open output folder'),
  ].join('\n');
}

export function buildFailureMessage(
  trigger: TriggerRecord,
  exitCode: number | null,
  timedOut: boolean,
): string {
  const reason = timedOut
    ? 'timed out'
    : exitCode === null
      ? 'did not start'
      : `exited with code ${exitCode}`;

  return [
    ':x: Failed to process video file',
    '',
    `*File:* ${escapeSlackText(trigger.name)}`,
    `*Path:* ${escapeSlackText(trigger.path)}`,
    `*Pipeline:* ${reason}`,
    'It will be retried on the next check. See the monitor logs for details.',
  ].join('\n');
}
