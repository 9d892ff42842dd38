import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { PpeImportConfig } from '../../config/ppeImport';
import { compareSizeOptions } from './mappers';
import {
  systemClock,
  type Clock,
  type ImportRun,
  type PpeItem,
  type PpeSizeOption,
  type PpeStockStore,
  type StockLevel,
  type StockReceiptInput,
  type StockReceiptRecord
} from './types';

export const IMPORT_TEMPLATE_FILE_NAME = 'ppe_stock_import_template.csv';

export async function listActiveItems(store: PpeStockStore): Promise<PpeItem[]> {
  const items = await store.listActiveItems();
  return [...items].sort((a, b) => (a.name === b.name ? 0 : a.name < b.name ? -1 : 1));
}

export async function listSizesForItem(store: PpeStockStore, itemId: string): Promise<PpeSizeOption[]> {
  const item = await store.findActiveItem(itemId);
  if (!item) {
    throw new Error('PPE_ITEM_NOT_FOUND');
  }
  const sizes = await store.listSizesForCategory(item.category);
  return [...sizes].sort(compareSizeOptions);
}

/**
 * Records one manually entered delivery. The size has to come from the
 * item's own category.
 */
export async function recordStockReceipt(
  store: PpeStockStore,
  input: StockReceiptInput,
  userId: string,
  clock: Clock = systemClock
): Promise<StockReceiptRecord> {
  const item = await store.findActiveItem(input.ppeId);
  if (!item) {
    throw new Error('PPE_ITEM_NOT_FOUND');
  }
  const sizes = await store.listSizesForCategory(item.category);
  if (!sizes.some((size) => size.id === input.sizeId)) {
    throw new Error('PPE_SIZE_NOT_FOR_ITEM');
  }

  const notes = input.notes?.trim() ?? '';
  const record: StockReceiptRecord = {
    itemId: item.id,
    sizeId: input.sizeId,
    quantity: input.quantity,
    unitCost: input.unitCost,
    transactionType: 'receive',
    transactionDate: input.transactionDate ? new Date(input.transactionDate) : clock(),
    submittedBy: userId,
    notes: notes || null
  };
  await store.insertStockReceipt(record);
  return record;
}

export function listStockLevels(store: PpeStockStore): Promise<StockLevel[]> {
  return store.listStockLevels();
}

export function getImportRun(store: PpeStockStore, id: string): Promise<ImportRun | null> {
  return store.getImportRun(id);
}

export function getImportTemplate(config: Pick<PpeImportConfig, 'templateDir'>): Promise<string> {
  return readFile(path.join(config.templateDir, IMPORT_TEMPLATE_FILE_NAME), 'utf8');
}
