import type { z } from 'zod';
import type { stockReceiptSchema } from '../../schemas/ppeStock.schema';

export type PpeCategory = string;

export type PpeItem = {
  id: string;
  name: string;
  category: PpeCategory;
};

export type PpeSizeOption = {
  id: string;
  category: PpeCategory;
  code: string;
  sortOrder: number;
};

export type StockReceiptRecord = {
  itemId: string;
  sizeId: string;
  quantity: number;
  unitCost: number;
  transactionType: 'receive';
  transactionDate: Date;
  submittedBy: string;
  notes: string | null;
};

export type StockReceiptInput = z.infer<typeof stockReceiptSchema>;

export type StockLevel = {
  ppeId: string;
  ppeName: string | null;
  sizeId: string;
  sizeCode: string;
  onHand: number;
};

export type ImportRow = {
  rawFields: string[];
  lineNumber: number;
};

export type RowSkipReason =
  | 'ROW_TOO_SHORT'
  | 'UNKNOWN_ITEM'
  | 'UNKNOWN_SIZE'
  | 'AMBIGUOUS_SIZE'
  | 'NEGATIVE_QUANTITY'
  | 'NEGATIVE_UNIT_COST'
  | 'PERSIST_FAILED';

export type RowError = {
  lineNumber: number;
  reason: RowSkipReason;
};

export type ImportPhase = 'not_started' | 'parsing_header' | 'processing_rows' | 'completed' | 'failed';

export type ImportOutcome = {
  runId: string | null;
  importedCount: number;
  skippedCount: number;
  records: StockReceiptRecord[];
  rowErrors?: RowError[];
};

export type ImportRunStatus = 'completed' | 'failed';

export type ImportRun = {
  id: string;
  status: ImportRunStatus;
  fileName: string | null;
  importedCount: number;
  skippedCount: number;
  rowErrors: RowError[];
  errorCode: string | null;
  createdBy: string;
  startedAt: Date;
  finishedAt: Date;
};

/**
 * Everything the receiving services need from the relational store.
 * Implementations return validated, typed records; raw rows never leave them.
 */
export interface PpeStockStore {
  listActiveItems(): Promise<PpeItem[]>;
  findActiveItem(id: string): Promise<PpeItem | null>;
  listActiveSizes(): Promise<PpeSizeOption[]>;
  listSizesForCategory(category: PpeCategory): Promise<PpeSizeOption[]>;
  insertStockReceipt(record: StockReceiptRecord): Promise<void>;
  listStockLevels(): Promise<StockLevel[]>;
  recordImportRun(run: ImportRun): Promise<void>;
  getImportRun(id: string): Promise<ImportRun | null>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
