import {
  Controller,
  ForbiddenException,
  Get,
  Header,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  Req,
} from '@nestjs/common';
import { Request } from 'express';
import { WebhookService } from './webhook.service';
import { WebhookChallengeDto } from './dto/webhook-challenge.dto';

export const SIGNATURE_HEADER = 'x-dropbox-signature';

/**
 * Controller for Dropbox webhook deliveries.
 */
@Controller('webhook')
export class WebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  /**
   * Endpoint verification: echo the challenge back verbatim.
   */
  @Get()
  @Header('Content-Type', 'text/plain')
  @Header('X-Content-Type-Options', 'nosniff')
  verify(@Query() query: WebhookChallengeDto): string {
    return query.challenge;
  }

  /**
   * Change notification. Acknowledged immediately; the folder check runs in
   * the background.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  receive(@Req() request: Request, @Headers(SIGNATURE_HEADER) signature?: string): void {
    // The raw parser leaves `{}` when the request has no body
    const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

    if (!this.webhookService.isAuthentic(body, signature)) {
      throw new ForbiddenException('Invalid webhook signature');
    }

    this.webhookService.handleNotification();
  }
}
