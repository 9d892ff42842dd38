import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('ppe_stock', {
    id: { type: 'uuid', primaryKey: true, default: pgm.func('gen_random_uuid()') },
    ppe_id: { type: 'uuid', notNull: true, references: 'ppe_list', onDelete: 'RESTRICT' },
    size_id: { type: 'uuid', notNull: true, references: 'ppe_sizes', onDelete: 'RESTRICT' },
    quantity: { type: 'integer' },
    price: { type: 'numeric(6,2)' },
    transaction_type: { type: 'text', notNull: true },
    transaction_date: { type: 'timestamptz' },
    notes: { type: 'text' },
    is_active: { type: 'boolean', default: true },
    user_id: { type: 'text' }
  });

  pgm.addConstraint('ppe_stock', 'chk_ppe_stock_receive_non_negative', {
    check: "transaction_type <> 'receive' OR (quantity >= 0 AND price >= 0)"
  });

  pgm.createIndex('ppe_stock', ['ppe_id', 'size_id'], { name: 'idx_ppe_stock_item_size' });

  pgm.createView(
    'ppe_stock_levels',
    { replace: true },
    `SELECT s.ppe_id, s.size_id, sz.size_code, COALESCE(SUM(s.quantity), 0)::integer AS on_hand
       FROM ppe_stock s
       JOIN ppe_sizes sz ON sz.id = s.size_id
      WHERE s.is_active IS NULL OR s.is_active = true
      GROUP BY s.ppe_id, s.size_id, sz.size_code`
  );
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropView('ppe_stock_levels');
  pgm.dropTable('ppe_stock');
}
