import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Bearer-token gate. With no token configured every request passes. */
export function requireAuth(authToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!authToken) return next();

    const header = req.headers.authorization;
    if (header === `Bearer ${authToken}`) return next();

    // Also accept ?token= (browsers cannot set headers on EventSource/WebSocket URLs)
    if (req.query.token === authToken) return next();

    res.status(401).json({ ok: false, error: 'Unauthorized' });
  };
}

export function requireWsAuth(authToken: string | undefined, token: string | undefined): boolean {
  if (!authToken) return true;
  return token === authToken;
}
