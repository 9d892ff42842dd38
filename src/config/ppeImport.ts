import path from 'node:path';

export type PpeImportConfig = {
  maxBytes: number;
  maxRows: number;
  itemLabel: string;
  defaultCategory: string;
  rowTimeoutMs: number;
  maxRowErrors: number;
  templateDir: string;
};

type PpeImportConfigOptions = {
  env?: NodeJS.ProcessEnv;
};

export const DEFAULT_PPE_IMPORT_CONFIG: PpeImportConfig = {
  maxBytes: 5 * 1024 * 1024,
  maxRows: 10000,
  itemLabel: 'ppe',
  defaultCategory: 'clothing',
  rowTimeoutMs: 0,
  maxRowErrors: 100,
  templateDir: 'templates'
};

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) return fallback;
  return parsed;
}

function parseLabel(value: string | undefined, fallback: string): string {
  const normalized = String(value ?? '').trim().toLowerCase();
  return normalized || fallback;
}

export function resolvePpeImportConfig(options: PpeImportConfigOptions = {}): PpeImportConfig {
  const env = options.env ?? process.env;
  const defaults = DEFAULT_PPE_IMPORT_CONFIG;
  return {
    maxBytes: parseNonNegativeInt(env.PPE_IMPORT_MAX_BYTES, defaults.maxBytes),
    maxRows: parseNonNegativeInt(env.PPE_IMPORT_MAX_ROWS, defaults.maxRows),
    itemLabel: parseLabel(env.PPE_IMPORT_ITEM_LABEL, defaults.itemLabel),
    // categories are stored lower-case in the catalog enum
    defaultCategory: parseLabel(env.PPE_DEFAULT_CATEGORY, defaults.defaultCategory),
    rowTimeoutMs: parseNonNegativeInt(env.PPE_IMPORT_ROW_TIMEOUT_MS, defaults.rowTimeoutMs),
    maxRowErrors: parseNonNegativeInt(env.PPE_IMPORT_MAX_ROW_ERRORS, defaults.maxRowErrors),
    templateDir: path.resolve(env.PPE_TEMPLATE_DIR?.trim() || defaults.templateDir)
  };
}
