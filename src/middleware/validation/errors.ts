import type { Request, Response, NextFunction } from 'express';
import { getErrorCode, getErrorDetail } from '../../lib/errors';
import { recordErrorLog } from '../../lib/errorLog';
import { mapPgErrorToHttp, type PgErrorMapping } from '../../lib/pgErrors';
import { FILE_TOO_LARGE_MESSAGE } from './bodyErrors';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

export type ErrorHandlerMap = Record<string, (detail: string | null) => ErrorResponse>;

type RouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

type AsyncErrorOptions = {
  location: string;
  errorMap?: ErrorHandlerMap;
  pgErrors?: PgErrorMapping;
};

/**
 * Create a standardized error response
 */
export function createErrorResponse(status: number, message: string, details?: unknown): ErrorResponse {
  return { status, body: { error: message, ...(details !== undefined ? { details } : {}) } };
}

/**
 * Wraps an async route. Service error codes found in `errorMap` and mapped
 * Postgres constraint errors become their responses; anything else is
 * written to errors_log and answered with a 500.
 */
export function asyncErrorHandler(handler: RouteHandler, options: AsyncErrorOptions) {
  const errorMap = options.errorMap ?? {};
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const code = getErrorCode(error);
      const mapper = Object.hasOwn(errorMap, code) ? errorMap[code] : undefined;
      const mapped = mapper
        ? mapper(getErrorDetail(error))
        : options.pgErrors
          ? mapPgErrorToHttp(error, options.pgErrors)
          : null;
      if (mapped) {
        return res.status(mapped.status).json(mapped.body);
      }

      await recordErrorLog({
        location: options.location,
        type: 'Api',
        error,
        userId: req.auth?.userId ?? null
      });
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error ? { details: error.message } : {})
      });
    }
  };
}

const REQUIRED_COLUMNS_MESSAGE = 'CSV must have columns: Date, PPE Item, Size, Quantity, Unit Cost. Optional: Notes';

export const ppeErrorMap: ErrorHandlerMap = {
  PPE_ITEM_NOT_FOUND: () => createErrorResponse(404, 'PPE item not found.'),
  PPE_SIZE_NOT_FOR_ITEM: () => createErrorResponse(400, 'Size does not belong to the selected PPE item.'),
  PPE_IMPORT_EMPTY: () => createErrorResponse(400, 'CSV is empty.'),
  PPE_IMPORT_FILE_TOO_LARGE: () => createErrorResponse(413, FILE_TOO_LARGE_MESSAGE),
  PPE_IMPORT_ROW_LIMIT: () => createErrorResponse(413, 'CSV exceeds row limit.'),
  PPE_IMPORT_MISSING_COLUMNS: (detail) =>
    createErrorResponse(400, REQUIRED_COLUMNS_MESSAGE, { missing: detail ? detail.split(',') : [] })
};
