import { describe, expect, it } from 'vitest';
import { DEFAULT_PPE_IMPORT_CONFIG, type PpeImportConfig } from '../../config/ppeImport';
import type { LogEntry } from '../../lib/logger';
import { PPE_IMPORT_EVENT } from '../../observability/ppeImport.events';
import { formatImportSummary, importStockReceipts } from './import.service';
import { createMemoryPpeStockStore } from './memoryStore';
import type { ImportPhase, PpeItem, PpeSizeOption } from './types';

const NOW = new Date('2025-03-01T12:00:00.000Z');
const HEADER = 'Date,Item,Size,Quantity,Unit Cost';

const items: PpeItem[] = [
  { id: 'i1', name: 'Hard Hat', category: 'ppe' },
  { id: 'i2', name: 'Safety Boots', category: 'footwear' }
];
const sizes: PpeSizeOption[] = [
  { id: 's1', category: 'ppe', code: 'M', sortOrder: 2 },
  { id: 's9', category: 'footwear', code: '9', sortOrder: 1 }
];

function setup(overrides: Partial<PpeImportConfig> = {}, storeSeed: Parameters<typeof createMemoryPpeStockStore>[0] = {}) {
  const store = createMemoryPpeStockStore({ items, sizes, ...storeSeed });
  const config: PpeImportConfig = { ...DEFAULT_PPE_IMPORT_CONFIG, ...overrides };
  const entries: LogEntry[] = [];
  const phases: ImportPhase[] = [];
  const run = (csvText: string, includeRowErrors = false) =>
    importStockReceipts(store, { csvText, userId: 'user-1', fileName: 'receipts.csv' }, config, {
      includeRowErrors,
      clock: () => NOW,
      log: (entry) => {
        entries.push(entry);
      },
      onPhase: (phase) => {
        phases.push(phase);
      },
      generateId: () => 'run-1'
    });
  return { store, entries, phases, run };
}

const csv = (...lines: string[]) => lines.join('\n');

describe('importStockReceipts', () => {
  it('imports a valid row against the catalog', async () => {
    const { store, run } = setup();
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,10,2.50'));

    expect(outcome).toEqual({
      runId: 'run-1',
      importedCount: 1,
      skippedCount: 0,
      records: [
        {
          itemId: 'i1',
          sizeId: 's1',
          quantity: 10,
          unitCost: 2.5,
          transactionType: 'receive',
          transactionDate: new Date('2024-01-10T00:00:00.000Z'),
          submittedBy: 'user-1',
          notes: null
        }
      ]
    });
    expect(store.receipts).toEqual(outcome.records);
  });

  it('skips unresolvable rows and keeps going', async () => {
    const { store, run } = setup();
    const outcome = await run(
      csv(HEADER, '2024-01-10,Hard Hat,M,10,2.50', '2024-01-10,Welding Mask,M,1,1.00', '2024-01-10,Hard Hat,XL,1,1.00'),
      true
    );

    expect(outcome.importedCount).toBe(1);
    expect(outcome.skippedCount).toBe(2);
    expect(outcome.rowErrors).toEqual([
      { lineNumber: 3, reason: 'UNKNOWN_ITEM' },
      { lineNumber: 4, reason: 'UNKNOWN_SIZE' }
    ]);
    expect(store.receipts).toHaveLength(1);
  });

  it('rejects a negative quantity instead of storing it', async () => {
    const { store, run } = setup();
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,-5,2.50'), true);

    expect(outcome.importedCount).toBe(0);
    expect(outcome.rowErrors).toEqual([{ lineNumber: 2, reason: 'NEGATIVE_QUANTITY' }]);
    expect(store.receipts).toEqual([]);
  });

  it('accepts zero quantity and cost, including unreadable numbers', async () => {
    const { run } = setup();
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,none,n/a'));

    expect(outcome.importedCount).toBe(1);
    expect(outcome.records[0]).toMatchObject({ quantity: 0, unitCost: 0 });
  });

  it('resolves sizes within the item category only', async () => {
    const { run } = setup();
    const outcome = await run(csv(HEADER, '2024-01-10,Safety Boots,M,1,30', '2024-01-10,Safety Boots,9,1,30'), true);

    expect(outcome.rowErrors).toEqual([{ lineNumber: 2, reason: 'UNKNOWN_SIZE' }]);
    expect(outcome.records.map((record) => record.sizeId)).toEqual(['s9']);
  });

  it('rejects a size code shared by two catalog entries', async () => {
    const { run } = setup(
      {},
      { sizes: [...sizes, { id: 's1-dup', category: 'ppe', code: 'M', sortOrder: 5 }] }
    );
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1'), true);

    expect(outcome.rowErrors).toEqual([{ lineNumber: 2, reason: 'AMBIGUOUS_SIZE' }]);
  });

  it('skips rows that are too short', async () => {
    const { run } = setup();
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M'), true);

    expect(outcome.rowErrors).toEqual([{ lineNumber: 2, reason: 'ROW_TOO_SHORT' }]);
  });

  it('falls back to the import time for unreadable dates', async () => {
    const { run } = setup();
    const outcome = await run(csv(HEADER, 'last week,Hard Hat,M,1,1'));

    expect(outcome.records[0].transactionDate).toEqual(NOW);
  });

  it('reads quoted fields and optional notes', async () => {
    const { run } = setup();
    const outcome = await run(
      csv('Notes,Unit Cost,Quantity,Size,PPE Item,Date', '"Delivery 12, pallet 3",£2.50,"1,000",M,Hard Hat,15/01/2025')
    );

    expect(outcome.records).toEqual([
      {
        itemId: 'i1',
        sizeId: 's1',
        quantity: 1000,
        unitCost: 2.5,
        transactionType: 'receive',
        transactionDate: new Date('2025-01-15T00:00:00.000Z'),
        submittedBy: 'user-1',
        notes: 'Delivery 12, pallet 3'
      }
    ]);
  });

  it('counts a failed insert as skipped and carries on', async () => {
    const { store, entries, run } = setup(
      {},
      { failInsert: (record) => (record.quantity === 7 ? new Error('connection reset') : null) }
    );
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,7,1', '2024-01-10,Hard Hat,M,8,1'), true);

    expect(outcome.importedCount).toBe(1);
    expect(outcome.rowErrors).toEqual([{ lineNumber: 2, reason: 'PERSIST_FAILED' }]);
    expect(store.receipts.map((record) => record.quantity)).toEqual([8]);
    const skipped = entries.find((entry) => entry.event === PPE_IMPORT_EVENT.ROW_SKIPPED);
    expect(skipped).toMatchObject({ level: 'warn', lineNumber: 2, reason: 'PERSIST_FAILED', detail: 'connection reset' });
  });

  it('waits out a slow insert before writing the next row', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const { store, entries, run } = setup(
      { rowTimeoutMs: 10 },
      {
        beforeInsert: async (record) => {
          inFlight += 1;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise((resolve) => setTimeout(resolve, record.quantity === 1 ? 60 : 0));
          inFlight -= 1;
        }
      }
    );
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1', '2024-01-10,Hard Hat,M,2,1'), true);

    expect(outcome.importedCount).toBe(2);
    expect(outcome.skippedCount).toBe(0);
    expect(outcome.rowErrors).toEqual([]);
    expect(store.receipts.map((record) => record.quantity)).toEqual([1, 2]);
    expect(maxInFlight).toBe(1);
    expect(entries.filter((entry) => entry.event === PPE_IMPORT_EVENT.ROW_SLOW)).toEqual([
      expect.objectContaining({
        level: 'warn',
        lineNumber: 2,
        message: 'stock receipt insert (line 2) timed out after 10ms'
      })
    ]);
  });

  it('counts a slow insert that then fails as a persistence failure', async () => {
    const { store, run } = setup(
      { rowTimeoutMs: 10 },
      {
        beforeInsert: (record) =>
          new Promise((resolve) => setTimeout(resolve, record.quantity === 1 ? 40 : 0)),
        failInsert: (record) => (record.quantity === 1 ? new Error('deadlock detected') : null)
      }
    );
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1', '2024-01-10,Hard Hat,M,2,1'), true);

    expect(outcome.importedCount).toBe(1);
    expect(outcome.rowErrors).toEqual([{ lineNumber: 2, reason: 'PERSIST_FAILED' }]);
    expect(store.receipts.map((record) => record.quantity)).toEqual([2]);
  });

  it('aborts on a missing column before touching the catalog', async () => {
    const { store, phases, run } = setup();

    await expect(run(csv('Date,Item,Size,Unit Cost', '2024-01-10,Hard Hat,M,2.50'))).rejects.toThrow(
      'PPE_IMPORT_MISSING_COLUMNS:Quantity'
    );
    expect(store.calls).toEqual(['recordImportRun']);
    expect(store.receipts).toEqual([]);
    expect(phases).toEqual(['parsing_header', 'failed']);
    expect(store.runs).toEqual([
      {
        id: 'run-1',
        status: 'failed',
        fileName: 'receipts.csv',
        importedCount: 0,
        skippedCount: 0,
        rowErrors: [],
        errorCode: 'PPE_IMPORT_MISSING_COLUMNS',
        createdBy: 'user-1',
        startedAt: NOW,
        finishedAt: NOW
      }
    ]);
  });

  it('lists every missing column by its label', async () => {
    const { run } = setup();

    await expect(run(csv('Date,Notes', '2024-01-10,x'))).rejects.toThrow(
      'PPE_IMPORT_MISSING_COLUMNS:PPE Item,Size,Quantity,Unit Cost'
    );
  });

  it('rejects empty, oversized and overlong files', async () => {
    await expect(setup().run(' \n\n')).rejects.toThrow('PPE_IMPORT_EMPTY');
    await expect(setup({ maxBytes: 10 }).run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1'))).rejects.toThrow(
      'PPE_IMPORT_FILE_TOO_LARGE'
    );
    await expect(
      setup({ maxRows: 1 }).run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1', '2024-01-10,Hard Hat,M,2,1'))
    ).rejects.toThrow('PPE_IMPORT_ROW_LIMIT');
  });

  it('reports phase transitions in order', async () => {
    const { phases, entries, run } = setup();
    await run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1'));

    expect(phases).toEqual(['parsing_header', 'processing_rows', 'completed']);
    expect(entries.map((entry) => entry.event)).toEqual([
      PPE_IMPORT_EVENT.STARTED,
      PPE_IMPORT_EVENT.PHASE,
      PPE_IMPORT_EVENT.PHASE,
      PPE_IMPORT_EVENT.PHASE,
      PPE_IMPORT_EVENT.COMPLETED
    ]);
  });

  it('keeps row errors out of the outcome unless asked, but always on the run', async () => {
    const { store, run } = setup({ maxRowErrors: 1 });
    const outcome = await run(csv(HEADER, 'x,Nope,M,1,1', 'x,Nope,M,1,1', 'x,Nope,M,1,1'));

    expect(outcome.skippedCount).toBe(3);
    expect(outcome.rowErrors).toBeUndefined();
    expect(store.runs[0].rowErrors).toEqual([{ lineNumber: 2, reason: 'UNKNOWN_ITEM' }]);
    expect(store.runs[0].skippedCount).toBe(3);
  });

  it('still returns the outcome when the run cannot be recorded', async () => {
    const { entries, run } = setup({}, { failRecordRun: true });
    const outcome = await run(csv(HEADER, '2024-01-10,Hard Hat,M,1,1'));

    expect(outcome.runId).toBeNull();
    expect(outcome.importedCount).toBe(1);
    expect(entries.find((entry) => entry.event === PPE_IMPORT_EVENT.RUN_RECORD_FAILED)).toMatchObject({
      level: 'error',
      runId: 'run-1',
      message: 'RUN_TABLE_UNAVAILABLE'
    });
  });
});

describe('formatImportSummary', () => {
  it('mentions skipped rows only when there are some', () => {
    expect(formatImportSummary({ importedCount: 3, skippedCount: 0 })).toBe('Imported 3 row(s)');
    expect(formatImportSummary({ importedCount: 1, skippedCount: 2 })).toBe('Imported 1 row(s); 2 skipped');
  });
});
