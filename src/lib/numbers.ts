const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^(?:\d+\.?\d*|\.\d+)$/;

/**
 * Whole-number quantity from free text: everything except digits and `-` is
 * dropped first (`"1,200 pcs"` → 1200). Anything unreadable is 0.
 */
export function coerceQuantity(value: string | null | undefined): number {
  const cleaned = (value ?? '').replace(/[^\d-]/g, '');
  if (!INTEGER_PATTERN.test(cleaned)) return 0;
  const parsed = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

/**
 * Decimal cost from free text: everything except digits and `.` is dropped
 * first (`"£2.50"` → 2.5). Anything unreadable is 0.
 */
export function coerceUnitCost(value: string | null | undefined): number {
  const cleaned = (value ?? '').replace(/[^\d.]/g, '');
  if (!DECIMAL_PATTERN.test(cleaned)) return 0;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : 0;
}
