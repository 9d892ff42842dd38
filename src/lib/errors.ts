export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Service errors carry a code, optionally followed by `:detail`
 * (`PPE_IMPORT_MISSING_COLUMNS:Size,Quantity`).
 */
export function getErrorCode(error: unknown): string {
  const message = getErrorMessage(error);
  const separator = message.indexOf(':');
  return separator >= 0 ? message.slice(0, separator) : message;
}

export function getErrorDetail(error: unknown): string | null {
  const message = getErrorMessage(error);
  const separator = message.indexOf(':');
  return separator >= 0 ? message.slice(separator + 1) : null;
}
