import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { PlayerService } from '../services/playerService';

declare module 'express-serve-static-core' {
  interface Request {
    user?: { id: string; username: string };
  }
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers['authorization'];
  return typeof header === 'string' && header.startsWith('Bearer ') ? header.slice(7) : undefined;
}

export function requireAuth(players: PlayerService): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) return res.status(401).json({ error: 'unauthorized' });
    try {
      const player = await players.authenticate(token);
      if (!player) return res.status(401).json({ error: 'unauthorized' });
      req.user = { id: player.id, username: player.username };
      return next();
    } catch (err) {
      console.error('[auth] authenticate failed', err);
      return res.status(500).json({ error: 'auth_failed' });
    }
  };
}

// For handlers behind requireAuth.
export function currentUser(req: Request): { id: string; username: string } {
  if (!req.user) throw new Error('currentUser called on a route without requireAuth');
  return req.user;
}
