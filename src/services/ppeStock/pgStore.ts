import { query } from '../../db';
import { isPresent, mapImportRunRow, mapPpeItemRow, mapPpeSizeRow, mapStockLevelRow } from './mappers';
import type { ImportRun, PpeStockStore, StockReceiptRecord } from './types';

type PgStoreOptions = {
  defaultCategory: string;
};

export function createPgPpeStockStore(options: PgStoreOptions): PpeStockStore {
  return {
    async listActiveItems() {
      const res = await query(
        `SELECT id, name, category::text AS category
           FROM ppe_list
          WHERE is_active = true
          ORDER BY name`
      );
      return res.rows.map((row) => mapPpeItemRow(row, options.defaultCategory)).filter(isPresent);
    },

    async findActiveItem(id: string) {
      const res = await query(
        `SELECT id, name, category::text AS category
           FROM ppe_list
          WHERE id = $1 AND is_active = true`,
        [id]
      );
      if (res.rowCount === 0) return null;
      return mapPpeItemRow(res.rows[0], options.defaultCategory);
    },

    async listActiveSizes() {
      const res = await query(
        `SELECT id, category::text AS category, size_code, sort_order
           FROM ppe_sizes
          WHERE is_active = true`
      );
      return res.rows.map(mapPpeSizeRow).filter(isPresent);
    },

    async listSizesForCategory(category: string) {
      const res = await query(
        `SELECT id, category::text AS category, size_code, sort_order
           FROM ppe_sizes
          WHERE category::text = $1 AND is_active = true
          ORDER BY sort_order, size_code`,
        [category]
      );
      return res.rows.map(mapPpeSizeRow).filter(isPresent);
    },

    async insertStockReceipt(record: StockReceiptRecord) {
      await query(
        `INSERT INTO ppe_stock (
            ppe_id, size_id, quantity, price, transaction_type, transaction_date, user_id, notes
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          record.itemId,
          record.sizeId,
          record.quantity,
          record.unitCost,
          record.transactionType,
          record.transactionDate,
          record.submittedBy,
          record.notes
        ]
      );
    },

    async listStockLevels() {
      const res = await query(
        `SELECT l.ppe_id, p.name AS ppe_name, l.size_id, l.size_code, l.on_hand
           FROM ppe_stock_levels l
           LEFT JOIN ppe_list p ON p.id = l.ppe_id
          ORDER BY p.name, l.size_code`
      );
      return res.rows.map(mapStockLevelRow).filter(isPresent);
    },

    async recordImportRun(run: ImportRun) {
      await query(
        `INSERT INTO ppe_stock_imports (
            id, status, file_name, imported_count, skipped_count, row_errors, error_code,
            created_by, started_at, finished_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          run.id,
          run.status,
          run.fileName,
          run.importedCount,
          run.skippedCount,
          JSON.stringify(run.rowErrors),
          run.errorCode,
          run.createdBy,
          run.startedAt,
          run.finishedAt
        ]
      );
    },

    async getImportRun(id: string) {
      const res = await query(
        `SELECT id, status, file_name, imported_count, skipped_count, row_errors, error_code,
                created_by, started_at, finished_at
           FROM ppe_stock_imports
          WHERE id = $1`,
        [id]
      );
      if (res.rowCount === 0) return null;
      return mapImportRunRow(res.rows[0]);
    }
  };
}
