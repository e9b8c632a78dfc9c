import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

function matches(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require the configured key in `X-Api-Key`, or in `?apikey=` for
 * EventSource clients that cannot set headers. No key configured: open.
 */
export function requireApiKey(apiKey: string | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      return next();
    }

    const header = req.header('x-api-key');
    const query = typeof req.query.apikey === 'string' ? req.query.apikey : undefined;
    const provided = header ?? query;

    if (!provided) {
      return res.status(401).json({ error: 'API key required' });
    }
    if (!matches(provided, apiKey)) {
      return res.status(401).json({ error: 'Invalid API key' });
    }
    return next();
  };
}
