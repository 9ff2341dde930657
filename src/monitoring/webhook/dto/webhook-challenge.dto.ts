import { IsNotEmpty, IsString } from 'class-validator';

/**
 * Query of the Dropbox endpoint verification request.
 */
export class WebhookChallengeDto {
  /** Random token to echo back verbatim */
  @IsString()
  @IsNotEmpty()
  challenge!: string;
}
