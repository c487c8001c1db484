/**
 * API middleware: async route wrapping, request logging and error mapping.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { PipelineError, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** Forward rejections of an async handler to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      log.debug('Request handled', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof PipelineError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(
      apiError(createTypedError({ code: 'REQUEST.MALFORMED_BODY', message: 'Request body is not valid JSON', retryable: false })),
    );
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', { message, stack: err instanceof Error ? err.stack : undefined });
  res.status(500).json(apiError(createTypedError({ code: 'SYSTEM.INTERNAL', message, retryable: false })));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('SPEC.') || error.code.startsWith('REQUEST.')) return 400;
  if (error.code === 'RUN.INVALID_TRANSITION' || error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code === 'DEPLOYMENT.TARGET_BUSY') return 409;
  return 500;
}

export function requestError(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError(createTypedError({ code: 'REQUEST.INVALID', message, retryable: false, details }));
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}
