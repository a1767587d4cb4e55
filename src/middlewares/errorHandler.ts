import { NextFunction, Request, Response } from 'express';
import { isRagError } from '../services/rag/errors';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isRagError(err)) {
    console.warn('[error]', err.message);
    res.status(err.status).json({ message: err.message });
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ message: 'Malformed JSON body' });
    return;
  }

  console.error('[error]', err);
  res.status(500).json({ message: 'Internal server error' });
}
