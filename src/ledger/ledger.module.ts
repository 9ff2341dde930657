import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LEDGER_BACKEND, LedgerBackend } from './interfaces/ledger-backend.interface';
import { JsonFileLedgerBackend } from './backends/json-file-ledger.backend';
import { InMemoryLedgerBackend } from './backends/in-memory-ledger.backend';
import { ProcessedLedgerService } from './processed-ledger.service';

/**
 * Module providing the dedup ledger.
 *
 * The backend is chosen by `LEDGER_BACKEND`: `file` (default) persists to
 * `LEDGER_FILE`, `memory` keeps nothing across restarts.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: LEDGER_BACKEND,
      useFactory: (configService: ConfigService): LedgerBackend => {
        if (configService.get<string>('LEDGER_BACKEND') === 'memory') {
          return new InMemoryLedgerBackend();
        }
        return new JsonFileLedgerBackend(
          configService.get<string>('LEDGER_FILE') || './data/processed_files.json',
        );
      },
      inject: [ConfigService],
    },
    ProcessedLedgerService,
  ],
  exports: [ProcessedLedgerService],
})
export class LedgerModule {}
