import { Module } from '@nestjs/common';
import { TransactionsController } from '../controllers/transactions/transactions.controller';
import { BalanceController } from '../controllers/balance/balance.controller';
import { LedgerModule } from '../services/ledger/ledger.module';

/**
 * ApiModule
 *
 * Provides REST API controllers on top of the ledger store
 */
@Module({
  imports: [LedgerModule],
  controllers: [TransactionsController, BalanceController],
})
export class ApiModule {}
