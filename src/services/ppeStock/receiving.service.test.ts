import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_PPE_IMPORT_CONFIG } from '../../config/ppeImport';
import { importStockReceipts } from './import.service';
import { createMemoryPpeStockStore } from './memoryStore';
import {
  getImportRun,
  getImportTemplate,
  listActiveItems,
  listSizesForItem,
  listStockLevels,
  recordStockReceipt
} from './receiving.service';
import type { PpeItem, PpeSizeOption } from './types';

const HI_VIS = '5a1f7c3e-3d0b-4f39-9a52-0d7d5f0c1a01';
const BOOTS = '5a1f7c3e-3d0b-4f39-9a52-0d7d5f0c1a02';
const SIZE_L = '8c2d4e6f-1a2b-4c3d-8e9f-0a1b2c3d4e01';
const SIZE_M = '8c2d4e6f-1a2b-4c3d-8e9f-0a1b2c3d4e02';
const SIZE_9 = '8c2d4e6f-1a2b-4c3d-8e9f-0a1b2c3d4e03';

const items: PpeItem[] = [
  { id: HI_VIS, name: 'Hi-Vis Vest', category: 'clothing' },
  { id: BOOTS, name: 'Safety Boots', category: 'footwear' }
];
const sizes: PpeSizeOption[] = [
  { id: SIZE_L, category: 'clothing', code: 'L', sortOrder: 4 },
  { id: SIZE_M, category: 'clothing', code: 'M', sortOrder: 3 },
  { id: SIZE_9, category: 'footwear', code: '9', sortOrder: 1 }
];

const templateDir = path.resolve(__dirname, '../../../templates');
const clock = () => new Date('2025-03-01T12:00:00.000Z');

describe('catalog queries', () => {
  it('lists items by name', async () => {
    const store = createMemoryPpeStockStore({ items: [...items].reverse(), sizes });
    expect((await listActiveItems(store)).map((item) => item.name)).toEqual(['Hi-Vis Vest', 'Safety Boots']);
  });

  it('lists the sizes of the item category in display order', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    expect((await listSizesForItem(store, HI_VIS)).map((size) => size.code)).toEqual(['M', 'L']);
  });

  it('throws for an unknown item', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    await expect(listSizesForItem(store, SIZE_L)).rejects.toThrow('PPE_ITEM_NOT_FOUND');
  });
});

describe('recordStockReceipt', () => {
  it('stores a receipt dated now with trimmed notes', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    const record = await recordStockReceipt(
      store,
      { ppeId: BOOTS, sizeId: SIZE_9, quantity: 4, unitCost: 31.5, notes: '  carton 2 ' },
      'user-1',
      clock
    );

    expect(record).toEqual({
      itemId: BOOTS,
      sizeId: SIZE_9,
      quantity: 4,
      unitCost: 31.5,
      transactionType: 'receive',
      transactionDate: clock(),
      submittedBy: 'user-1',
      notes: 'carton 2'
    });
    expect(store.receipts).toEqual([record]);
  });

  it('keeps an explicit transaction date', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    const record = await recordStockReceipt(
      store,
      { ppeId: HI_VIS, sizeId: SIZE_M, quantity: 1, unitCost: 0, transactionDate: '2025-02-10T09:00:00+01:00' },
      'user-1',
      clock
    );
    expect(record.transactionDate).toEqual(new Date('2025-02-10T08:00:00.000Z'));
    expect(record.notes).toBeNull();
  });

  it('refuses a size from another category', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    await expect(
      recordStockReceipt(store, { ppeId: BOOTS, sizeId: SIZE_L, quantity: 1, unitCost: 1 }, 'user-1', clock)
    ).rejects.toThrow('PPE_SIZE_NOT_FOR_ITEM');
    expect(store.receipts).toEqual([]);
  });
});

describe('stock levels and import runs', () => {
  it('sums received quantities per item and size', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    await recordStockReceipt(store, { ppeId: BOOTS, sizeId: SIZE_9, quantity: 4, unitCost: 1 }, 'user-1', clock);
    await recordStockReceipt(store, { ppeId: BOOTS, sizeId: SIZE_9, quantity: 6, unitCost: 1 }, 'user-1', clock);

    expect(await listStockLevels(store)).toEqual([
      { ppeId: BOOTS, ppeName: 'Safety Boots', sizeId: SIZE_9, sizeCode: '9', onHand: 10 }
    ]);
  });

  it('returns null for an unknown run', async () => {
    const store = createMemoryPpeStockStore({ items, sizes });
    expect(await getImportRun(store, 'missing')).toBeNull();
  });
});

describe('getImportTemplate', () => {
  it('ships a template the importer accepts', async () => {
    const template = await getImportTemplate({ templateDir });
    expect(template.split('\n')[0]).toBe('Date,PPE Item,Size,Quantity,Unit Cost,Notes');

    const store = createMemoryPpeStockStore({ items, sizes });
    const outcome = await importStockReceipts(
      store,
      { csvText: template, userId: 'user-1' },
      DEFAULT_PPE_IMPORT_CONFIG,
      { clock, log: () => undefined, generateId: () => 'run-template' }
    );

    expect(outcome.importedCount).toBe(2);
    expect(outcome.skippedCount).toBe(0);
    expect(outcome.records.map((record) => record.notes)).toEqual(['Delivery note 1042, pallet 1', null]);
    expect(await getImportRun(store, 'run-template')).toMatchObject({ status: 'completed', importedCount: 2 });
  });
});
