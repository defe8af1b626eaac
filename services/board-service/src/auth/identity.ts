import type { IncomingMessage } from 'http';
import type { Request, Response } from 'express';
import type { IdentityResolver } from '../types';
import type { SessionStore } from './sessions';

const BEARER = /^Bearer\s+(\S+)$/i;

/** Session token from `Authorization: Bearer <token>`, or the `token` query parameter for WebSocket clients. */
export function extractToken(req: IncomingMessage): string | null {
  const header = req.headers.authorization;
  if (header) {
    const match = BEARER.exec(header);
    if (match) return match[1];
  }
  const url = new URL(req.url ?? '/', 'http://localhost');
  const fromQuery = url.searchParams.get('token');
  return fromQuery ? fromQuery : null;
}

export class TokenIdentityResolver implements IdentityResolver {
  constructor(private readonly sessions: SessionStore) {}

  async resolveUserId(req: IncomingMessage): Promise<number | null> {
    const token = extractToken(req);
    return token ? this.sessions.resolve(token) : null;
  }
}

type AuthedHandler = (req: Request, res: Response, userId: number) => Promise<void>;

export function requireAuth(identity: IdentityResolver, handler: AuthedHandler) {
  return async (req: Request, res: Response): Promise<void> => {
    let userId: number | null;
    try {
      userId = await identity.resolveUserId(req);
    } catch (error) {
      console.error('[Auth] Error resolving session:', error);
      res.status(500).json({ error: 'Internal server error' });
      return;
    }
    if (userId === null) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    await handler(req, res, userId);
  };
}
