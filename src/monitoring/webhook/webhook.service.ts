import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DispatcherService } from '../../dispatch/dispatcher.service';
import { ChangeDetectionService } from '../change-detection.service';
import { verifySignature } from './webhook-signature';

/**
 * Service behind the Dropbox webhook endpoint.
 *
 * @remarks
 * Dropbox notifications only say "something changed for this account", so
 * every accepted notification triggers a listing of the watch folder rather
 * than reading the payload.
 */
@Injectable()
export class WebhookService implements OnModuleInit {
  private readonly logger = new Logger(WebhookService.name);
  private readonly secret: string | undefined;
  private readonly enabled: boolean;

  constructor(
    private configService: ConfigService,
    private changeDetectionService: ChangeDetectionService,
    private dispatcherService: DispatcherService,
  ) {
    this.secret = this.configService.get<string>('DROPBOX_WEBHOOK_SECRET') || undefined;
    this.enabled = this.configService.get<string>('MONITOR_MODE') !== 'polling';
  }

  onModuleInit(): void {
    if (this.enabled && !this.secret) {
      this.logger.warn(
        'DROPBOX_WEBHOOK_SECRET is not set: webhook signatures are not verified (reduced-security mode)',
      );
    }
  }

  /**
   * Verify the notification signature.
   *
   * Without a configured secret every request is accepted.
   */
  isAuthentic(rawBody: Buffer, signature: string | undefined): boolean {
    if (!this.secret) {
      this.logger.debug('Accepting unsigned webhook notification (no secret configured)');
      return true;
    }

    const valid = verifySignature(this.secret, rawBody, signature);
    if (!valid) {
      this.logger.warn(
        signature ? 'Rejected webhook notification: invalid signature' : 'Rejected webhook notification: missing signature',
      );
    }
    return valid;
  }

  /**
   * Schedule detection and dispatch without waiting for them.
   */
  handleNotification(): void {
    if (!this.enabled) {
      this.logger.log('Webhook notification ignored: MONITOR_MODE is polling');
      return;
    }

    this.logger.log('Received webhook notification, checking watch folder');
    this.dispatcherService.enqueue('webhook', async () => {
      const detection = await this.changeDetectionService.detectNewFiles();
      return detection.candidates;
    });
  }
}
