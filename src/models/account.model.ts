import Decimal from 'decimal.js';
import { Transaction } from './transaction.model';

/**
 * Account model
 *
 * Named balance holder, opened implicitly by its first deposit.
 * balance is kept denormalized and must always equal
 * sum(deposits) - sum(withdrawals) over transactions.
 */
export interface Account {
  readonly id: string;
  balance: Decimal;
  readonly transactions: Transaction[];
}
