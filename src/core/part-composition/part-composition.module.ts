import { Module } from '@nestjs/common';
import {
  RUNTIME_SETTINGS,
  ensureRuntimeEnvLoaded,
  readRuntimeSettings,
} from '../../runtime-env';
import { LedgerTransactionService } from './ledger-transaction.service';
import { OwnershipRegistryService } from './ownership-registry.service';
import { PartCompositionEngine } from './part-composition-engine.service';
import { PartEventLogService } from './part-event-log.service';
import { PartSampleDataSeeder } from './part-sample-data.seeder';

@Module({
  providers: [
    {
      provide: RUNTIME_SETTINGS,
      useFactory: () => {
        ensureRuntimeEnvLoaded();
        return readRuntimeSettings();
      },
    },
    LedgerTransactionService,
    PartEventLogService,
    OwnershipRegistryService,
    PartCompositionEngine,
    PartSampleDataSeeder,
  ],
  exports: [PartCompositionEngine, OwnershipRegistryService, PartEventLogService],
})
export class PartCompositionModule {}
