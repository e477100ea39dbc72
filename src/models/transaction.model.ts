import { TransactionType } from '../common/enums/transaction-type.enum';

/**
 * Transaction model
 *
 * Immutable record of a single deposit or withdrawal.
 * Appended to the owning account's history and never modified or removed.
 *
 * Invariants:
 * - amount > 0 (direction determined by type)
 * - timestamps are non-decreasing within one account's history
 */
export interface Transaction {
  readonly id: string;
  readonly accountId: string;
  readonly type: TransactionType;
  readonly amount: number;
  readonly description: string | null;
  readonly timestamp: Date;
}
