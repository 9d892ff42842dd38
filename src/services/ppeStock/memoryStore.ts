import type { ImportRun, PpeItem, PpeSizeOption, PpeStockStore, StockLevel, StockReceiptRecord } from './types';

type MemoryStoreSeed = {
  items?: PpeItem[];
  sizes?: PpeSizeOption[];
  beforeInsert?: (record: StockReceiptRecord) => Promise<void>;
  failInsert?: (record: StockReceiptRecord) => Error | null;
  failRecordRun?: boolean;
};

export type MemoryPpeStockStore = PpeStockStore & {
  receipts: StockReceiptRecord[];
  runs: ImportRun[];
  calls: string[];
};

/**
 * In-process store for tests. Stock levels are summed from the receipts it
 * has accepted.
 */
export function createMemoryPpeStockStore(seed: MemoryStoreSeed = {}): MemoryPpeStockStore {
  const items = seed.items ?? [];
  const sizes = seed.sizes ?? [];
  const receipts: StockReceiptRecord[] = [];
  const runs: ImportRun[] = [];
  const calls: string[] = [];

  return {
    receipts,
    runs,
    calls,

    async listActiveItems() {
      calls.push('listActiveItems');
      return [...items];
    },

    async findActiveItem(id: string) {
      calls.push('findActiveItem');
      return items.find((item) => item.id === id) ?? null;
    },

    async listActiveSizes() {
      calls.push('listActiveSizes');
      return [...sizes];
    },

    async listSizesForCategory(category: string) {
      calls.push('listSizesForCategory');
      return sizes.filter((size) => size.category === category);
    },

    async insertStockReceipt(record: StockReceiptRecord) {
      calls.push('insertStockReceipt');
      await seed.beforeInsert?.(record);
      const failure = seed.failInsert?.(record) ?? null;
      if (failure) throw failure;
      receipts.push(record);
    },

    async listStockLevels() {
      calls.push('listStockLevels');
      const levels = new Map<string, StockLevel>();
      receipts.forEach((receipt) => {
        const key = `${receipt.itemId}|${receipt.sizeId}`;
        const existing = levels.get(key);
        if (existing) {
          existing.onHand += receipt.quantity;
          return;
        }
        levels.set(key, {
          ppeId: receipt.itemId,
          ppeName: items.find((item) => item.id === receipt.itemId)?.name ?? null,
          sizeId: receipt.sizeId,
          sizeCode: sizes.find((size) => size.id === receipt.sizeId)?.code ?? '',
          onHand: receipt.quantity
        });
      });
      return [...levels.values()];
    },

    async recordImportRun(run: ImportRun) {
      calls.push('recordImportRun');
      if (seed.failRecordRun) throw new Error('RUN_TABLE_UNAVAILABLE');
      runs.push(run);
    },

    async getImportRun(id: string) {
      calls.push('getImportRun');
      return runs.find((run) => run.id === id) ?? null;
    }
  };
}
