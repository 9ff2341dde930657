import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WebClient } from '@slack/web-api';

/**
 * Service for posting chat notifications to Slack.
 *
 * @remarks
 * **Design Decision: Notifications Never Throw**
 *
 * `notify` reports delivery as a boolean. Callers have already recorded the
 * file as processed, and a failed notice must not cause the file to be
 * processed again.
 */
@Injectable()
export class SlackNotifierService {
  private readonly logger = new Logger(SlackNotifierService.name);
  private readonly client: WebClient | null;
  private readonly defaultChannel: string;

  constructor(private configService: ConfigService) {
    const token = this.configService.get<string>('SLACK_BOT_TOKEN');
    this.client = token ? new WebClient(token, { retryConfig: { retries: 2 } }) : null;
    this.defaultChannel =
      this.configService.get<string>('SLACK_CHANNEL') || '#video-notifications';

    if (!this.client) {
      this.logger.warn('SLACK_BOT_TOKEN is not set; notifications are disabled');
    }
  }

  getDefaultChannel(): string {
    return this.defaultChannel;
  }

  /**
   * Post a message to a channel.
   *
   * @param channel - Channel name (`#videos`) or id
   * @param message - Slack mrkdwn text, links as `<url|label>`
   * @returns Whether Slack accepted the message
   */
  async notify(channel: string, message: string): Promise<boolean> {
    if (!this.client) {
      return false;
    }

    try {
      const response = await this.client.chat.postMessage({
        channel,
        text: message,
        mrkdwn: true,
        unfurl_links: false,
      });

      if (!response.ok) {
        this.logger.error(`Slack rejected notification to ${channel}: ${response.error ?? 'unknown error'}`);
        return false;
      }

      this.logger.log(`Notification sent to ${channel}`);
      return true;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to send notification to ${channel}: ${errorMessage}`);
      return false;
    }
  }
}
