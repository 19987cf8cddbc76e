import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Guard for the session status routes. Callers present the shared key in
 * X-API-Key; the expected key is looked up on every request so a restarted
 * process picks up a rotated API_KEY.
 */
export function createApiKeyGuard(getExpectedKey: () => string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expectedKey = getExpectedKey();
    if (!expectedKey) {
      console.error('[Auth] API_KEY not configured; refusing session requests');
      res.status(500).json({ error: 'Server configuration error' });
      return;
    }

    const presented = req.headers['x-api-key'];
    if (presented === undefined) {
      res.status(401).json({ error: 'Missing X-API-Key header' });
      return;
    }

    // Repeated headers arrive as an array and never match
    if (typeof presented !== 'string' || !sameKey(presented, expectedKey)) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}

function sameKey(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export const requireSessionApiKey = createApiKeyGuard(() => process.env.API_KEY);
