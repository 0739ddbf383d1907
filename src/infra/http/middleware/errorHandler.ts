import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  NotFoundError,
  PoolNotInitializedError,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

const BODY_ERROR_CODES: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

/**
 * body-parser marks request mistakes (oversized body, unknown charset, aborted
 * upload) with a 4xx status and expose=true.
 */
function clientErrorStatus(err: Error): number | null {
  const status = 'status' in err ? err.status : undefined;
  const expose = 'expose' in err ? err.expose : undefined;
  if (typeof status !== 'number' || expose !== true) {
    return null;
  }
  return status >= 400 && status < 500 ? status : null;
}

export function notFoundHandler(_req: Request, res: Response): void {
  send(res, 404, { code: 'NOT_FOUND', message: 'Route not found' });
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  // express.json() rejects unparseable bodies with type 'entity.parse.failed'
  if ('type' in err && err.type === 'entity.parse.failed') {
    send(res, 400, { code: 'INVALID_JSON', message: 'Malformed JSON body' });
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    send(res, clientStatus, {
      code: BODY_ERROR_CODES[clientStatus] ?? 'BAD_REQUEST',
      message: err.message,
    });
    return;
  }

  if (err instanceof NotFoundError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof ConflictError) {
    send(res, 409, { code: 'CONFLICT', message: err.message });
    return;
  }

  // Anything past this point is a server-side failure worth logging
  console.error('Error:', err);

  if (err instanceof PoolNotInitializedError) {
    send(res, 503, { code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
    return;
  }

  // Driver and framework errors
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
