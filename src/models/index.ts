export * from './account.model';
export * from './transaction.model';
