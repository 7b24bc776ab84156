/**
 * Supabase JWT Auth Middleware
 *
 * Verifies Supabase HS256 JWT tokens and extracts identity claims. The
 * platform role (client, agent, admin) is read from `app_metadata.role`.
 *
 * SECURITY: Does NOT call Supabase to validate tokens - just verifies signature + exp/nbf.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as jose from 'jose';

const LOG_PREFIX = '[Auth]';

/**
 * Identity claims extracted from a validated Supabase JWT
 */
export interface SupabaseIdentity {
  user_id: string;          // From JWT 'sub' claim
  email: string | null;     // From JWT 'email' claim
  app_role: string | null;  // From JWT 'app_metadata.role'
  role: string | null;      // Supabase role, e.g. 'authenticated'
  exp: number | null;
}

/**
 * Extended Express Request with identity attached
 */
export interface AuthenticatedRequest extends Request {
  identity?: SupabaseIdentity;
}

function getBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7);
}

function stringClaim(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function extractIdentity(payload: jose.JWTPayload): SupabaseIdentity {
  const appMetadata = payload.app_metadata;
  const appRole = typeof appMetadata === 'object' && appMetadata !== null && 'role' in appMetadata
    ? stringClaim(appMetadata.role)
    : null;

  return {
    user_id: payload.sub || '',
    email: stringClaim(payload.email),
    app_role: appRole,
    role: stringClaim(payload.role),
    exp: typeof payload.exp === 'number' ? payload.exp : null,
  };
}

/**
 * Verify a JWT against the project secret.
 * @returns identity, or null when the token does not verify
 */
export async function verifyAndExtractIdentity(token: string, secret: string): Promise<SupabaseIdentity | null> {
  try {
    const { payload } = await jose.jwtVerify(token, new TextEncoder().encode(secret), {
      algorithms: ['HS256'],
    });
    return extractIdentity(payload);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`${LOG_PREFIX} JWT verification failed: ${reason}`);
    return null;
  }
}

/**
 * Middleware factory: require valid Supabase JWT authentication.
 * Attaches req.identity on success, 401 on missing/invalid token.
 */
export function requireAuth(jwtSecret: string | null): RequestHandler {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    if (!jwtSecret) {
      console.error(`${LOG_PREFIX} SUPABASE_JWT_SECRET is not configured`);
      res.status(503).json({
        ok: false,
        error: 'AUTH_UNAVAILABLE',
        message: 'Authentication is not configured',
      });
      return;
    }

    const token = getBearerToken(req);
    if (!token) {
      res.status(401).json({
        ok: false,
        error: 'UNAUTHENTICATED',
        message: 'Missing or invalid Authorization header. Expected: Bearer <token>',
      });
      return;
    }

    const identity = await verifyAndExtractIdentity(token, jwtSecret);
    if (!identity) {
      res.status(401).json({
        ok: false,
        error: 'UNAUTHENTICATED',
        message: 'Invalid or expired token',
      });
      return;
    }

    req.identity = identity;
    next();
  };
}

/**
 * Middleware: require one of the given platform roles.
 * Must be used AFTER requireAuth.
 */
export function requireRole(...roles: string[]): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.identity) {
      res.status(401).json({
        ok: false,
        error: 'UNAUTHENTICATED',
        message: 'Authentication required',
      });
      return;
    }

    if (!req.identity.app_role || !roles.includes(req.identity.app_role)) {
      console.warn(`${LOG_PREFIX} Access denied: user ${req.identity.user_id} has role ${req.identity.app_role ?? 'none'}`);
      res.status(403).json({
        ok: false,
        error: 'FORBIDDEN',
        message: `This endpoint requires one of: ${roles.join(', ')}`,
      });
      return;
    }

    next();
  };
}
