export type LedgerErrorCode =
  | 'ACCOUNT_NOT_FOUND'
  | 'INSUFFICIENT_FUNDS'
  | 'INVALID_TRANSACTION';

/**
 * Base class for domain rejections raised by the ledger store.
 * Mapped to HTTP responses by HttpExceptionFilter.
 */
export abstract class LedgerError extends Error {
  protected constructor(
    readonly code: LedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AccountNotFoundError extends LedgerError {
  constructor(readonly accountId: string) {
    super('ACCOUNT_NOT_FOUND', `Account ${accountId} does not exist.`);
  }
}

export class InsufficientFundsError extends LedgerError {
  constructor(
    readonly accountId: string,
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      'INSUFFICIENT_FUNDS',
      `Insufficient funds for withdrawal from account ${accountId}: requested ${requested}, available ${available}`,
    );
  }
}

export class InvalidTransactionError extends LedgerError {
  constructor(message: string) {
    super('INVALID_TRANSACTION', message);
  }
}
