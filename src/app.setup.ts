import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { raw } from 'express';

export const WEBHOOK_BODY_LIMIT = '1mb';

/**
 * HTTP setup shared by the server bootstrap and the e2e tests.
 *
 * The application is created with `bodyParser: false`. Webhook signatures
 * cover the exact request bytes, so `/webhook` gets a raw parser that takes
 * every content type, malformed JSON included.
 */
export function configureApp(app: NestExpressApplication): void {
  app.use('/webhook', raw({ type: () => true, limit: WEBHOOK_BODY_LIMIT }));
  app.useGlobalPipes(new ValidationPipe({ transform: true }));
}
