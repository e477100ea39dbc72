import { Injectable } from '@nestjs/common';
import { LedgerStats, LedgerStore } from './services/ledger/ledger-store.service';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  uptime: number;
  ledger: LedgerStats;
}

@Injectable()
export class AppService {
  constructor(private readonly ledgerStore: LedgerStore) {}

  getHealth(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      ledger: this.ledgerStore.getStats(),
    };
  }
}
