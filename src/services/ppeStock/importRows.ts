import { normalizeHeaderLabel } from '../../lib/csv';
import { parseReceiptDate } from '../../lib/dates';
import { coerceQuantity, coerceUnitCost } from '../../lib/numbers';
import type { ImportRow, PpeItem, PpeSizeOption, RowSkipReason, StockReceiptRecord } from './types';

type RequiredColumn = 'date' | 'item' | 'size' | 'quantity' | 'unitCost';

export type ImportColumns = Record<RequiredColumn, number> & {
  notes: number | null;
  minWidth: number;
};

const REQUIRED_COLUMNS: RequiredColumn[] = ['date', 'item', 'size', 'quantity', 'unitCost'];

export function columnLabels(itemLabel: string): Record<RequiredColumn, string> {
  return {
    date: 'Date',
    item: `${itemLabel.toUpperCase()} Item`,
    size: 'Size',
    quantity: 'Quantity',
    unitCost: 'Unit Cost'
  };
}

/**
 * Locates the import columns in the header row. Labels match exactly after
 * trimming and lower-casing; the item column also accepts any header that
 * mentions both the catalog label and "item". Throws
 * `PPE_IMPORT_MISSING_COLUMNS:<labels>` when a required column is absent.
 */
export function resolveImportColumns(header: string[], itemLabel: string): ImportColumns {
  const labels = header.map(normalizeHeaderLabel);
  const exact = (label: string) => labels.indexOf(label);

  let item = exact(`${itemLabel} item`);
  if (item < 0) item = exact('item');
  if (item < 0) item = labels.findIndex((label) => label.includes(itemLabel) && label.includes('item'));

  const found: Record<RequiredColumn, number> = {
    date: exact('date'),
    item,
    size: exact('size'),
    quantity: exact('quantity'),
    unitCost: exact('unit cost')
  };

  const missing = REQUIRED_COLUMNS.filter((column) => found[column] < 0);
  if (missing.length > 0) {
    const names = columnLabels(itemLabel);
    throw new Error(`PPE_IMPORT_MISSING_COLUMNS:${missing.map((column) => names[column]).join(',')}`);
  }

  const notes = exact('notes');
  return {
    ...found,
    notes: notes >= 0 ? notes : null,
    minWidth: Math.max(...REQUIRED_COLUMNS.map((column) => found[column])) + 1
  };
}

export type ReferenceIndex = {
  itemsByName: ReadonlyMap<string, PpeItem>;
  sizeIdsByKey: ReadonlyMap<string, readonly string[]>;
};

export function sizeKey(category: string, code: string) {
  return `${category}|${code}`;
}

/**
 * Name lookups are exact and case-sensitive; a repeated name keeps the last
 * item. A size key shared by several ids is kept with all of them so the row
 * can be rejected as ambiguous.
 */
export function buildReferenceIndex(items: PpeItem[], sizes: PpeSizeOption[]): ReferenceIndex {
  const itemsByName = new Map<string, PpeItem>();
  items.forEach((item) => {
    const name = item.name.trim();
    if (name) itemsByName.set(name, item);
  });

  const sizeIdsByKey = new Map<string, string[]>();
  sizes.forEach((size) => {
    if (!size.category || !size.code) return;
    const key = sizeKey(size.category, size.code);
    const ids = sizeIdsByKey.get(key) ?? [];
    if (!ids.includes(size.id)) ids.push(size.id);
    sizeIdsByKey.set(key, ids);
  });

  return { itemsByName, sizeIdsByKey };
}

export type RowEvaluation =
  | { ok: true; record: StockReceiptRecord }
  | { ok: false; reason: RowSkipReason };

type EvaluateRowContext = {
  columns: ImportColumns;
  index: ReferenceIndex;
  submittedBy: string;
  now: Date;
};

function field(row: ImportRow, idx: number) {
  return (row.rawFields[idx] ?? '').trim();
}

export function evaluateImportRow(row: ImportRow, context: EvaluateRowContext): RowEvaluation {
  const { columns, index } = context;
  if (row.rawFields.length < columns.minWidth) {
    return { ok: false, reason: 'ROW_TOO_SHORT' };
  }

  const itemName = field(row, columns.item);
  const item = itemName ? index.itemsByName.get(itemName) : undefined;
  if (!item) {
    return { ok: false, reason: 'UNKNOWN_ITEM' };
  }

  const sizeIds = index.sizeIdsByKey.get(sizeKey(item.category, field(row, columns.size))) ?? [];
  if (sizeIds.length === 0) {
    return { ok: false, reason: 'UNKNOWN_SIZE' };
  }
  if (sizeIds.length > 1) {
    return { ok: false, reason: 'AMBIGUOUS_SIZE' };
  }

  const quantity = coerceQuantity(field(row, columns.quantity));
  if (quantity < 0) {
    return { ok: false, reason: 'NEGATIVE_QUANTITY' };
  }
  const unitCost = coerceUnitCost(field(row, columns.unitCost));
  if (unitCost < 0) {
    return { ok: false, reason: 'NEGATIVE_UNIT_COST' };
  }

  const notes = columns.notes !== null ? field(row, columns.notes) : '';
  return {
    ok: true,
    record: {
      itemId: item.id,
      sizeId: sizeIds[0],
      quantity,
      unitCost,
      transactionType: 'receive',
      transactionDate: parseReceiptDate(field(row, columns.date)) ?? context.now,
      submittedBy: context.submittedBy,
      notes: notes || null
    }
  };
}
