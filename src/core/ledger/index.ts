// src/core/ledger/index.ts
export { SQLiteLedger } from './ledger.js';
export type { LedgerOptions } from './ledger.js';
export type { Ledger, LedgerListOptions, ProcessedLink } from './types.js';
