import { query } from '../db';
import { getErrorMessage } from './errors';
import { logEvent } from './logger';
import { getRequestContext } from './requestContext';

type ErrorSeverity = 'critical' | 'error' | 'warning' | 'info';

type ErrorLogInput = {
  location: string;
  type: string;
  error: unknown;
  userId?: string | null;
  severity?: ErrorSeverity;
  errorCode?: string | null;
};

const MAX_STACK_LENGTH = 5000;

function truncateStack(stack: string | undefined): string | null {
  if (!stack) return null;
  return stack.length > MAX_STACK_LENGTH ? `${stack.slice(0, MAX_STACK_LENGTH)}... [truncated]` : stack;
}

/**
 * Writes a row to errors_log. Never throws: a failed write is reported on
 * the console together with the original error.
 */
export async function recordErrorLog(input: ErrorLogInput): Promise<void> {
  const description = getErrorMessage(input.error);
  const stack = input.error instanceof Error ? input.error.stack : undefined;
  const userId = input.userId ?? getRequestContext()?.userId ?? null;

  try {
    await query(
      `INSERT INTO errors_log (
          user_id, platform, location, type, severity, error_code, description, stack_trace
       ) VALUES ($1, 'api', $2, $3, $4, $5, $6, $7)`,
      [
        userId,
        input.location,
        input.type,
        input.severity ?? 'error',
        input.errorCode ?? null,
        description,
        truncateStack(stack)
      ]
    );
  } catch (logError) {
    logEvent('error', 'error_log_write_failed', {
      location: input.location,
      type: input.type,
      description,
      writeError: getErrorMessage(logError)
    });
  }
}
