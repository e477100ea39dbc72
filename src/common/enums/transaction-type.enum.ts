/**
 * Transaction types accepted by the ledger
 * Amounts are always positive, the type gives the direction
 */
export enum TransactionType {
  DEPOSIT = 'deposit', // Increases balance, opens the account on first use
  WITHDRAWAL = 'withdrawal', // Decreases balance, requires an existing account with sufficient funds
}
