/**
 * Single-identity authorization. The one allowed identity is presented as a
 * Bearer token and compared in constant time.
 */

import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export type AuthDecision =
  | { allowed: true; identity: string }
  | { allowed: false; status: 401 | 403; error: string; description: string };

/**
 * Timing-safe comparison to prevent timing attacks
 */
export function safeCompare(provided: string, expected: string): boolean {
  if (!provided || !expected) return false;

  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);

  // Pad to same length to prevent length-based timing leaks
  if (providedBuf.length !== expectedBuf.length) {
    const paddedProvided = Buffer.alloc(expectedBuf.length);
    providedBuf.copy(paddedProvided);
    timingSafeEqual(paddedProvided, expectedBuf);
    return false;
  }

  return timingSafeEqual(providedBuf, expectedBuf);
}

export function isAllowed(identity: string, allowedIdentity: string): boolean {
  return safeCompare(identity, allowedIdentity);
}

export function parseBearer(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match ? match[1] : null;
}

export function authorize(header: string | undefined, allowedIdentity: string): AuthDecision {
  const identity = parseBearer(header);
  if (!identity) {
    return { allowed: false, status: 401, error: 'unauthorized', description: 'Bearer token required' };
  }
  if (!isAllowed(identity, allowedIdentity)) {
    return { allowed: false, status: 403, error: 'forbidden', description: 'Identity is not allowed' };
  }
  return { allowed: true, identity };
}

/**
 * Reject every request that does not carry the allowed identity.
 * The accepted identity is left in res.locals for later middleware.
 */
export function createAuthMiddleware(allowedIdentity: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const decision = authorize(req.headers.authorization, allowedIdentity);

    if (!decision.allowed) {
      console.warn(`Authorization denied (${decision.status}) for ${req.ip ?? 'unknown address'}`);
      if (decision.status === 401) {
        res.setHeader('WWW-Authenticate', 'Bearer');
      }
      res.status(decision.status).json({ error: decision.error, error_description: decision.description });
      return;
    }

    res.locals.identity = decision.identity;
    next();
  };
}
