import {
  importRunRowSchema,
  ppeItemRowSchema,
  ppeSizeRowSchema,
  stockLevelRowSchema
} from '../../schemas/ppeStock.schema';
import type { ImportRun, PpeItem, PpeSizeOption, StockLevel } from './types';

/**
 * Catalog rows without an id are dropped. A blank category falls back to
 * `defaultCategory` so the item still resolves sizes.
 */
export function mapPpeItemRow(row: unknown, defaultCategory: string): PpeItem | null {
  const parsed = ppeItemRowSchema.safeParse(row);
  if (!parsed.success) return null;
  return {
    id: parsed.data.id,
    name: parsed.data.name,
    category: parsed.data.category || defaultCategory
  };
}

export function mapPpeSizeRow(row: unknown): PpeSizeOption | null {
  const parsed = ppeSizeRowSchema.safeParse(row);
  if (!parsed.success) return null;
  return {
    id: parsed.data.id,
    category: parsed.data.category,
    code: parsed.data.size_code,
    sortOrder: parsed.data.sort_order ?? 0
  };
}

export function mapStockLevelRow(row: unknown): StockLevel | null {
  const parsed = stockLevelRowSchema.safeParse(row);
  if (!parsed.success) return null;
  return {
    ppeId: parsed.data.ppe_id,
    ppeName: parsed.data.ppe_name ?? null,
    sizeId: parsed.data.size_id,
    sizeCode: parsed.data.size_code,
    onHand: parsed.data.on_hand
  };
}

export function mapImportRunRow(row: unknown): ImportRun {
  const data = importRunRowSchema.parse(row);
  return {
    id: data.id,
    status: data.status,
    fileName: data.file_name ?? null,
    importedCount: data.imported_count,
    skippedCount: data.skipped_count,
    rowErrors: data.row_errors ?? [],
    errorCode: data.error_code ?? null,
    createdBy: data.created_by,
    startedAt: data.started_at,
    finishedAt: data.finished_at
  };
}

export function compareSizeOptions(a: PpeSizeOption, b: PpeSizeOption) {
  if (a.sortOrder !== b.sortOrder) return a.sortOrder - b.sortOrder;
  if (a.code === b.code) return 0;
  return a.code < b.code ? -1 : 1;
}

export function isPresent<T>(value: T | null): value is T {
  return value !== null;
}
