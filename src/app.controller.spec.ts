import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { LedgerModule } from './services/ledger/ledger.module';
import { LedgerStore } from './services/ledger/ledger-store.service';
import { TransactionType } from './common/enums/transaction-type.enum';

describe('AppController', () => {
  let controller: AppController;
  let ledgerStore: LedgerStore;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [LedgerModule],
      controllers: [AppController],
      providers: [AppService],
    }).compile();

    controller = module.get<AppController>(AppController);
    ledgerStore = module.get<LedgerStore>(LedgerStore);
  });

  it('should report ledger totals in the health check', () => {
    ledgerStore.recordTransaction('acc1', TransactionType.DEPOSIT, 100);
    ledgerStore.recordTransaction('acc1', TransactionType.WITHDRAWAL, 30);

    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.ledger).toEqual({ accounts: 1, transactions: 2 });
    expect(typeof health.uptime).toBe('number');
    expect(new Date(health.timestamp).toISOString()).toBe(health.timestamp);
  });
});
