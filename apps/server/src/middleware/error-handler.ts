/**
 * The one place where errors become HTTP responses.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { isTaskboardError, type ErrorKind, type ErrorDetails, type Logger } from '@taskboard/core';

export interface ErrorBody {
  error: {
    kind: ErrorKind | 'bad_request' | 'route_not_found' | 'internal_error';
    message: string;
    details: ErrorDetails;
  };
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation_error: 422,
  not_found: 404,
  conflict: 409,
  storage_error: 503,
};

/** body-parser raises a SyntaxError carrying `status: 400` for malformed JSON */
function isMalformedJson(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/** http-errors style client error, as raised by body-parser for oversized or mis-encoded bodies */
function isClientHttpError(err: unknown): err is Error & { status: number } {
  return err instanceof Error
    && 'status' in err && typeof err.status === 'number'
    && err.status >= 400 && err.status < 500
    && 'expose' in err && err.expose === true;
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (isTaskboardError(err)) {
    return {
      status: STATUS_BY_KIND[err.kind],
      body: { error: { kind: err.kind, message: err.message, details: err.details } },
    };
  }
  if (isMalformedJson(err)) {
    return {
      status: 400,
      body: { error: { kind: 'bad_request', message: 'Malformed JSON body', details: {} } },
    };
  }
  if (isClientHttpError(err)) {
    return {
      status: err.status,
      body: { error: { kind: 'bad_request', message: err.message, details: {} } },
    };
  }
  return {
    status: 500,
    body: { error: { kind: 'internal_error', message: 'Internal server error', details: {} } },
  };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ component: 'http' });

  return (err: unknown, req, res, _next) => {
    const { status, body } = toErrorResponse(err);
    const context = { method: req.method, path: req.originalUrl, status, kind: body.error.kind };

    if (status >= 500) {
      log.error({ ...context, err }, body.error.message);
    } else {
      log.warn(context, body.error.message);
    }

    res.status(status).json(body);
  };
}

export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ErrorBody = {
    error: {
      kind: 'route_not_found',
      message: `No route for ${req.method} ${req.path}`,
      details: {},
    },
  };
  res.status(404).json(body);
};
