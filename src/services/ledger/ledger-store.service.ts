import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Account, Transaction } from '../../models';
import { TransactionType } from '../../common/enums/transaction-type.enum';
import {
  AccountNotFoundError,
  InsufficientFundsError,
  InvalidTransactionError,
  LedgerError,
  LedgerErrorCode,
} from '../../common/errors/ledger.errors';
import {
  LEDGER_CLOCK,
  LEDGER_ID_GENERATOR,
  LedgerClock,
  TransactionIdGenerator,
} from './ledger.constants';

export type TransactionOutcome =
  | { status: 'recorded'; transaction: Transaction }
  | { status: 'rejected'; reason: LedgerErrorCode; message: string };

export interface LedgerStats {
  accounts: number;
  transactions: number;
}

const TRANSACTION_TYPES: readonly string[] = Object.values(TransactionType);

// single source of truth for accounts and their transaction logs
// every operation is synchronous: validate fully, then mutate
// this is the only place where a balance changes
@Injectable()
export class LedgerStore {
  private readonly logger = new Logger(LedgerStore.name);
  private readonly accounts = new Map<string, Account>();

  constructor(
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
    @Inject(LEDGER_ID_GENERATOR) private readonly generateId: TransactionIdGenerator,
  ) {}

  // deposit opens the account if needed, withdrawal never does
  recordTransaction(
    accountId: string,
    type: TransactionType,
    amount: number,
    description?: string | null,
  ): Transaction {
    this.validateRequest(accountId, type, amount);

    const existing = this.accounts.get(accountId);
    const delta = new Decimal(amount);
    let nextBalance: Decimal;

    if (type === TransactionType.DEPOSIT) {
      nextBalance = (existing?.balance ?? new Decimal(0)).plus(delta);
    } else {
      if (!existing) {
        throw new AccountNotFoundError(accountId);
      }

      if (delta.greaterThan(existing.balance)) {
        this.logger.debug(
          `Insufficient balance for account ${accountId}: requested ${amount}, available ${existing.balance.toNumber()}`,
        );
        throw new InsufficientFundsError(accountId, amount, existing.balance.toNumber());
      }

      nextBalance = existing.balance.minus(delta);
    }

    if (!Number.isFinite(nextBalance.toNumber())) {
      throw new InvalidTransactionError(
        `Transaction would take the balance of account ${accountId} out of the representable range`,
      );
    }

    const transaction: Transaction = Object.freeze({
      id: this.generateId(),
      accountId,
      type,
      amount,
      description: description ?? null,
      timestamp: this.nextTimestamp(existing),
    });

    const account = existing ?? this.openAccount(accountId);
    account.transactions.push(transaction);
    account.balance = nextBalance;

    this.logger.log(
      `Recorded ${type} of ${amount} for account ${accountId}, transaction ${transaction.id}`,
    );

    return this.snapshot(transaction);
  }

  // same as recordTransaction, but domain rejections come back as a value
  tryRecordTransaction(
    accountId: string,
    type: TransactionType,
    amount: number,
    description?: string | null,
  ): TransactionOutcome {
    try {
      const transaction = this.recordTransaction(accountId, type, amount, description);
      return { status: 'recorded', transaction };
    } catch (error) {
      if (error instanceof LedgerError) {
        return { status: 'rejected', reason: error.code, message: error.message };
      }
      throw error;
    }
  }

  getBalance(accountId: string): number {
    return this.getAccount(accountId).balance.toNumber();
  }

  // full history in insertion order, returned as a copy
  getTransactions(accountId: string): Transaction[] {
    return this.getAccount(accountId).transactions.map((tx) => this.snapshot(tx));
  }

  hasAccount(accountId: string): boolean {
    return this.accounts.has(accountId);
  }

  // recomputes the balance from the log and compares with the stored one
  validateBalanceInvariants(accountId: string): boolean {
    const account = this.getAccount(accountId);

    const derived = account.transactions.reduce(
      (sum, tx) =>
        tx.type === TransactionType.DEPOSIT ? sum.plus(tx.amount) : sum.minus(tx.amount),
      new Decimal(0),
    );

    const valid = derived.equals(account.balance) && !account.balance.isNegative();
    if (!valid) {
      this.logger.error(
        `Balance invariant violated for account ${accountId}: stored ${account.balance.toString()}, derived ${derived.toString()}`,
      );
    }

    return valid;
  }

  getStats(): LedgerStats {
    let transactions = 0;
    for (const account of this.accounts.values()) {
      transactions += account.transactions.length;
    }

    return { accounts: this.accounts.size, transactions };
  }

  private getAccount(accountId: string): Account {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    return account;
  }

  private openAccount(accountId: string): Account {
    const account: Account = {
      id: accountId,
      balance: new Decimal(0),
      transactions: [],
    };
    this.accounts.set(accountId, account);

    this.logger.log(`Opened account ${accountId}`);

    return account;
  }

  // Date is mutable, callers get their own copy
  private snapshot(tx: Transaction): Transaction {
    return Object.freeze({ ...tx, timestamp: new Date(tx.timestamp.getTime()) });
  }

  // the clock may step backwards, history order must not
  private nextTimestamp(account: Account | undefined): Date {
    const now = this.clock();
    const last = account?.transactions[account.transactions.length - 1];

    if (last && last.timestamp.getTime() > now.getTime()) {
      return new Date(last.timestamp.getTime());
    }
    return now;
  }

  private validateRequest(accountId: string, type: string, amount: number): void {
    if (typeof accountId !== 'string' || accountId.trim().length === 0) {
      throw new InvalidTransactionError('Account ID must be a non-empty string');
    }

    if (!TRANSACTION_TYPES.includes(type)) {
      throw new InvalidTransactionError(`Unknown transaction type: ${type}`);
    }

    if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
      throw new InvalidTransactionError(`Transaction amount must be positive: ${amount}`);
    }
  }
}
