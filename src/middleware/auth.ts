import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

function digest(key: string): Buffer {
  return crypto.createHash('sha256').update(key).digest();
}

/** Requires `Authorization: Bearer <key>` or `x-api-key: <key>`. */
export function apiKeyAuth(expectedKey: string): RequestHandler {
  const expected = digest(expectedKey);

  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers['authorization'] || req.headers['x-api-key'];
    const key = (typeof header === 'string' ? header : header?.[0])?.replace(/^Bearer\s+/i, '').trim();
    if (!key || !crypto.timingSafeEqual(digest(key), expected)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}
