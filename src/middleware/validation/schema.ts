import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

/**
 * Middleware factory to validate UUID path parameters
 */
export function validateUuidParam(paramName: string = 'id') {
  const uuidSchema = z.string().uuid();

  return (req: Request, res: Response, next: NextFunction) => {
    const result = uuidSchema.safeParse(req.params[paramName]);
    if (!result.success) {
      return res.status(400).json({
        error: `Invalid ${paramName}.`,
        details: result.error.flatten()
      });
    }
    return next();
  };
}
