import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProcessedLedgerService } from '../ledger/processed-ledger.service';
import { PollingService } from '../monitoring/polling/polling.service';
import { ChangeDetectionService } from '../monitoring/change-detection.service';

export interface HealthStatus {
  status: 'ok';
  mode: string;
  watchFolder: string;
  processedFiles: number;
  lastPollAt: string | null;
}

@Controller('health')
export class HealthController {
  constructor(
    private configService: ConfigService,
    private ledgerService: ProcessedLedgerService,
    private pollingService: PollingService,
    private changeDetectionService: ChangeDetectionService,
  ) {}

  @Get()
  check(): HealthStatus {
    return {
      status: 'ok',
      mode: this.configService.get<string>('MONITOR_MODE') || 'webhook',
      watchFolder: this.changeDetectionService.getWatchFolder(),
      processedFiles: this.ledgerService.count(),
      lastPollAt: this.pollingService.getLastPollAt(),
    };
  }
}
