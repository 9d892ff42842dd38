import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createExtension('pgcrypto', { ifNotExists: true });
  pgm.createType('ppe_category', ['clothing', 'footwear']);

  pgm.createTable('ppe_list', {
    id: { type: 'uuid', primaryKey: true, default: pgm.func('gen_random_uuid()') },
    name: { type: 'text', notNull: true, unique: true },
    category: { type: 'ppe_category', notNull: true },
    is_active: { type: 'boolean', notNull: true, default: true }
  });

  // global size catalog, one row per category/code
  pgm.createTable('ppe_sizes', {
    id: { type: 'uuid', primaryKey: true, default: pgm.func('gen_random_uuid()') },
    category: { type: 'ppe_category', notNull: true },
    size_code: { type: 'text', notNull: true },
    is_active: { type: 'boolean', notNull: true, default: true },
    sort_order: { type: 'integer', notNull: true, default: 0 }
  });

  pgm.createIndex('ppe_sizes', ['category', 'sort_order'], { name: 'idx_ppe_sizes_category_sort' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('ppe_sizes');
  pgm.dropTable('ppe_list');
  pgm.dropType('ppe_category');
}
