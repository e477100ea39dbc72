import { v4 as uuidv4 } from 'uuid';

export const LEDGER_CLOCK = 'LEDGER_CLOCK';
export const LEDGER_ID_GENERATOR = 'LEDGER_ID_GENERATOR';

export type LedgerClock = () => Date;
export type TransactionIdGenerator = () => string;

export const systemClock: LedgerClock = () => new Date();
export const uuidGenerator: TransactionIdGenerator = () => uuidv4();
