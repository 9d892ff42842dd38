import type { ErrorResponse } from '../middleware/validation/errors';

type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type PgErrorMapping = {
  unique?: (err: PgError) => ErrorResponse | null;
  foreignKey?: (err: PgError) => ErrorResponse | null;
  check?: (err: PgError) => ErrorResponse | null;
  notNull?: (err: PgError) => ErrorResponse | null;
};

function asPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object') return null;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined;
  const detail = 'detail' in err && typeof err.detail === 'string' ? err.detail : undefined;
  return { code, constraint, detail };
}

/**
 * Maps Postgres constraint violations to HTTP responses. Callers supply the
 * bodies; codes without a mapping return null.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): ErrorResponse | null {
  const pgErr = asPgError(err);
  if (!pgErr) return null;
  switch (pgErr.code) {
    case '23505':
      return mapping.unique?.(pgErr) ?? null;
    case '23503':
      return mapping.foreignKey?.(pgErr) ?? null;
    case '23514':
      return mapping.check?.(pgErr) ?? null;
    case '23502':
      return mapping.notNull?.(pgErr) ?? null;
    default:
      return null;
  }
}
