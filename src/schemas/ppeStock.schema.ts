import { z } from 'zod';

const trimmedText = z
  .string()
  .nullish()
  .transform((value) => (value ?? '').trim());

// ppe_stock.quantity is integer, ppe_stock.price is numeric(6,2)
export const MAX_QUANTITY = 2_147_483_647;
export const MAX_UNIT_COST = 9999.99;

export const stockReceiptSchema = z.object({
  ppeId: z.string().uuid(),
  sizeId: z.string().uuid(),
  quantity: z.number().int().min(0).max(MAX_QUANTITY),
  unitCost: z.number().min(0).max(MAX_UNIT_COST),
  notes: z.string().max(2000).optional(),
  transactionDate: z.string().datetime({ offset: true }).optional()
});

export const importQuerySchema = z.object({
  fileName: z.string().trim().min(1).max(255).optional(),
  details: z.enum(['true', 'false']).optional()
});

// Row shapes as they come back from Postgres.

export const ppeItemRowSchema = z.object({
  id: z.string().trim().min(1),
  name: trimmedText,
  category: trimmedText
});

export const ppeSizeRowSchema = z.object({
  id: z.string().trim().min(1),
  category: trimmedText,
  size_code: trimmedText,
  sort_order: z.coerce.number().int().nullish()
});

export const stockLevelRowSchema = z.object({
  ppe_id: z.string().min(1),
  ppe_name: z.string().nullish(),
  size_id: z.string().min(1),
  size_code: trimmedText,
  on_hand: z.coerce.number()
});

const rowErrorSchema = z.object({
  lineNumber: z.number().int(),
  reason: z.enum([
    'ROW_TOO_SHORT',
    'UNKNOWN_ITEM',
    'UNKNOWN_SIZE',
    'AMBIGUOUS_SIZE',
    'NEGATIVE_QUANTITY',
    'NEGATIVE_UNIT_COST',
    'PERSIST_FAILED'
  ])
});

export const importRunRowSchema = z.object({
  id: z.string().min(1),
  status: z.enum(['completed', 'failed']),
  file_name: z.string().nullish(),
  imported_count: z.coerce.number().int(),
  skipped_count: z.coerce.number().int(),
  row_errors: z.array(rowErrorSchema).nullish(),
  error_code: z.string().nullish(),
  created_by: z.string().min(1),
  started_at: z.coerce.date(),
  finished_at: z.coerce.date()
});
