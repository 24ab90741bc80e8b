import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('auth');

/** Paths reachable without the API key. */
const OPEN_PATHS = new Set(['/api/status']);

/** The shared API key, or null when authentication is disabled. */
export function configuredApiKey(): string | null {
  const key = process.env.API_SECRET_KEY?.trim();
  return key ? key : null;
}

export function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given.trim());
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const apiKey = configuredApiKey();
  if (!apiKey || OPEN_PATHS.has(req.path)) {
    next();
    return;
  }

  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    log.warn({ path: req.path, ip: req.ip }, 'Unauthorized request, missing token');
    res.status(401).json({ error: 'Unauthorized: missing Bearer token' });
    return;
  }

  if (!tokensMatch(authHeader.slice('Bearer '.length), apiKey)) {
    log.warn({ path: req.path, ip: req.ip }, 'Unauthorized request, invalid token');
    res.status(401).json({ error: 'Unauthorized: invalid token' });
    return;
  }

  next();
}
