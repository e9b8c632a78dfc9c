import type { NextFunction, Request, Response } from 'express';
import logger from '../config/logger';
import { ConflictError, PipelineError, TransitionRejectedError } from '../utils/errors';

export function statusForError(error: unknown): number {
  if (!(error instanceof PipelineError)) return 500;
  switch (error.kind) {
    case 'validation':
      return 400;
    case 'not_found':
      return 404;
    case 'rejected':
    case 'conflict':
    case 'stale':
      return 409;
    case 'transient':
      return 503;
    default:
      return 500;
  }
}

export function sendError(res: Response, error: unknown, context: string): void {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error(`${context}:`, error);
  } else {
    logger.debug(`${context}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const body: Record<string, unknown> = {
    error: status === 500 ? 'Internal server error' : error instanceof Error ? error.message : String(error),
  };
  if (error instanceof PipelineError) {
    body.kind = error.kind;
  }
  if (error instanceof TransitionRejectedError) {
    body.state = error.currentState;
    body.operation = error.operation;
  }
  if (error instanceof ConflictError && error.existingId) {
    body.existingId = error.existingId;
  }
  res.status(status).json(body);
}

// Express recognises error handlers by their four parameters
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  sendError(res, err, `${req.method} ${req.path}`);
}
