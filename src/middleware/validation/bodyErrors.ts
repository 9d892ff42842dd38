import type { Request, Response, NextFunction } from 'express';
import type { ErrorResponse } from './errors';

export const FILE_TOO_LARGE_MESSAGE = 'CSV file exceeds size limit.';

function bodyParserErrorType(err: unknown): string | null {
  if (!err || typeof err !== 'object') return null;
  return 'type' in err && typeof err.type === 'string' ? err.type : null;
}

/**
 * Body-parser rejections (oversized or malformed bodies) as JSON responses;
 * null for anything else.
 */
export function mapBodyParserError(err: unknown): ErrorResponse | null {
  switch (bodyParserErrorType(err)) {
    case 'entity.too.large':
      return { status: 413, body: { error: FILE_TOO_LARGE_MESSAGE } };
    case 'entity.parse.failed':
      return { status: 400, body: { error: 'Request body could not be parsed.' } };
    case 'charset.unsupported':
    case 'encoding.unsupported':
      return { status: 415, body: { error: 'Unsupported request body encoding.' } };
    default:
      return null;
  }
}

export function bodyParserErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  const mapped = mapBodyParserError(err);
  if (!mapped) {
    return next(err);
  }
  return res.status(mapped.status).json(mapped.body);
}
