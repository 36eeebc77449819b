import type { Request, Response, NextFunction, RequestHandler } from 'express';

const windowMs = 60_000; // 1 minute

/** Fixed-window per-IP limiter for the control routes. */
export function rateLimit(maxPerWindow: number, now: () => number = Date.now): RequestHandler {
  const hits = new Map<string, { count: number; resetAt: number }>();

  return (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const t = now();

    let entry = hits.get(ip);
    if (!entry || t > entry.resetAt) {
      entry = { count: 0, resetAt: t + windowMs };
      hits.set(ip, entry);
    }

    entry.count++;

    if (entry.count > maxPerWindow) {
      res.status(429).json({ ok: false, error: 'Too many requests. Try again later.' });
      return;
    }

    next();
  };
}
