import { Module } from '@nestjs/common';
import { LedgerStore } from './ledger-store.service';
import {
  LEDGER_CLOCK,
  LEDGER_ID_GENERATOR,
  systemClock,
  uuidGenerator,
} from './ledger.constants';

/**
 * LedgerModule
 *
 * Provides the in-memory LedgerStore for all balance and history operations.
 * One store instance lives for the lifetime of the application.
 */
@Module({
  providers: [
    LedgerStore,
    { provide: LEDGER_CLOCK, useValue: systemClock },
    { provide: LEDGER_ID_GENERATOR, useValue: uuidGenerator },
  ],
  exports: [LedgerStore],
})
export class LedgerModule {}
