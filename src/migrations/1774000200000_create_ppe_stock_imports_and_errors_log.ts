import type { MigrationBuilder } from 'node-pg-migrate';

const IMPORT_STATUS = "('completed','failed')";
const ERROR_SEVERITY = "('critical','error','warning','info')";

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('ppe_stock_imports', {
    id: { type: 'uuid', primaryKey: true },
    status: { type: 'text', notNull: true },
    file_name: { type: 'text' },
    imported_count: { type: 'integer', notNull: true, default: 0 },
    skipped_count: { type: 'integer', notNull: true, default: 0 },
    row_errors: { type: 'jsonb', notNull: true, default: pgm.func("'[]'::jsonb") },
    error_code: { type: 'text' },
    created_by: { type: 'text', notNull: true },
    started_at: { type: 'timestamptz', notNull: true },
    finished_at: { type: 'timestamptz', notNull: true }
  });

  pgm.addConstraint('ppe_stock_imports', 'chk_ppe_stock_imports_status', {
    check: `status IN ${IMPORT_STATUS}`
  });

  pgm.createIndex('ppe_stock_imports', ['created_by', 'started_at'], { name: 'idx_ppe_stock_imports_user_started' });

  pgm.createTable('errors_log', {
    id: { type: 'bigserial', primaryKey: true },
    user_id: { type: 'text' },
    platform: { type: 'text', notNull: true },
    location: { type: 'text', notNull: true },
    type: { type: 'text', notNull: true },
    severity: { type: 'text', notNull: true, default: 'error' },
    error_code: { type: 'text' },
    description: { type: 'text', notNull: true },
    stack_trace: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('errors_log', 'chk_errors_log_severity', {
    check: `severity IN ${ERROR_SEVERITY}`
  });

  pgm.createIndex('errors_log', ['created_at'], { name: 'idx_errors_log_created' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('errors_log');
  pgm.dropTable('ppe_stock_imports');
}
