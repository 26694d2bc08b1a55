import type { RequestHandler } from 'express';
import type { Logger } from '@taskboard/core';

/** Log each request once its response has been sent */
export function requestLogger(logger: Logger): RequestHandler {
  const log = logger.child({ component: 'http' });

  return (req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
      log.info({
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 100) / 100,
      }, 'Request completed');
    });
    next();
  };
}
