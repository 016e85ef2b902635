// src/core/ledger/types.ts
import type { LedgerKind } from '../types/index.js';

export interface ProcessedLink {
  link: string;
  kind: LedgerKind | null;   // null for rows written before the column existed
  downloadedAt: string | null;
  folder: string | null;     // relative to the output root
}

export interface LedgerListOptions {
  kind?: LedgerKind;
  limit?: number;
}

export interface Ledger {
  isProcessed(link: string): boolean;
  markProcessed(link: string, kind: LedgerKind, folder?: string): boolean;
}
