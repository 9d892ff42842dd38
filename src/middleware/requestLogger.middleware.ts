import type { Request, Response, NextFunction } from 'express';
import { consoleSink, type LogSink } from '../lib/logger';

export function requestLoggerMiddleware(sink: LogSink = consoleSink) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const bytesIn = Number(req.headers['content-length'] ?? 0);

    res.on('finish', () => {
      sink({
        level: res.statusCode >= 500 ? 'error' : 'info',
        event: 'http_request',
        requestId: req.requestId,
        userId: req.auth?.userId ?? null,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
        bytesIn,
        bytesOut: Number(res.getHeader('content-length') ?? 0),
        userAgent: req.header('user-agent') ?? undefined,
        timestamp: new Date().toISOString()
      });
    });

    next();
  };
}
