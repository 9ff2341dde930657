import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SlackNotifierService } from './slack-notifier.service';

@Module({
  imports: [ConfigModule],
  providers: [SlackNotifierService],
  exports: [SlackNotifierService],
})
export class NotificationModule {}
