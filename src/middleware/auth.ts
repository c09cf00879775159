import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { IncomingMessage } from 'http';
import type { AuthService, JWTPayload } from '../services/AuthService.js';
import { AppError } from '../utils/errors.js';

declare module 'fastify' {
  interface FastifyRequest {
    user: JWTPayload | null;
  }
}

const PUBLIC_PATHS = new Set(['/health', '/api/auth/login', '/api/auth/status', '/api/config']);

function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) return null;
  return header.substring(7);
}

export function createAuthMiddleware(authService: AuthService): preHandlerAsyncHookHandler {
  return async function authMiddleware(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    // Skip auth if disabled
    if (!authService.isEnabled()) {
      return;
    }

    const path = request.url.split('?')[0];
    if (PUBLIC_PATHS.has(path) || !path.startsWith('/api/')) {
      return;
    }

    const token = bearerToken(request.headers.authorization);
    if (!token) {
      const err = new AppError('Unauthorized', 'Missing or invalid authorization header');
      reply.status(err.statusCode).send(err.toJSON());
      return reply;
    }

    try {
      request.user = authService.verifyToken(token);
    } catch {
      const err = new AppError('Unauthorized', 'Invalid or expired token');
      reply.status(err.statusCode).send(err.toJSON());
      return reply;
    }
  };
}

export function extractTokenFromUrl(url: string): string | null {
  try {
    const urlObj = new URL(url, 'http://localhost');
    return urlObj.searchParams.get('token');
  } catch {
    return null;
  }
}

/** Upgrade check for the WebSocket endpoint: `?token=` must verify */
export function authorizeUpgrade(authService: AuthService, request: IncomingMessage): boolean {
  if (!authService.isEnabled()) return true;
  const token = extractTokenFromUrl(request.url ?? '');
  if (!token) return false;
  try {
    authService.verifyToken(token);
    return true;
  } catch {
    return false;
  }
}
