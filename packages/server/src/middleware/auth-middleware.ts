/**
 * Authentication Middleware
 *
 * Resolves the caller's Bearer token to an identity through an injected
 * IdentityProvider. Proxied routes never forward the caller's own
 * credentials; the environment's credentials are injected downstream.
 *
 * @module @tidewater/server/middleware/auth-middleware
 */

import { timingSafeEqual } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { RequestHandler } from 'express';
import {
  AuthenticationError,
  createServiceLogger,
  toError,
  type Logger,
} from '@tidewater/shared';
import { correlationIdFor, setIdentity } from './request-context.js';

// ============================================================================
// Types
// ============================================================================

export type ApiRole = 'admin' | 'operator' | 'viewer';

/**
 * Authenticated API caller
 */
export interface ApiIdentity {
  userId: string;
  roles: ApiRole[];
  /** Environments an operator or viewer is limited to; all when absent */
  environmentIds?: string[];
}

/**
 * External identity capability: resolves a bearer token, or null when unknown
 */
export interface IdentityProvider {
  authenticate(token: string): Promise<ApiIdentity | null>;
}

export interface AuthMiddlewareOptions {
  identityProvider: IdentityProvider;
  /** Whether to skip authentication for OPTIONS requests (default: true) */
  skipOptionsRequests?: boolean;
  logger?: Logger;
}

// ============================================================================
// Helper Functions
// ============================================================================

const BEARER_PREFIX = 'Bearer ';

/**
 * Extracts the Bearer token from the Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = authHeader.slice(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Accepts a fixed set of tokens, each mapped to an identity
 */
export class StaticTokenIdentityProvider implements IdentityProvider {
  private readonly tokens: ReadonlyMap<string, ApiIdentity>;

  constructor(tokens: ReadonlyMap<string, ApiIdentity>) {
    this.tokens = tokens;
  }

  /**
   * One token with full access
   */
  static admin(token: string): StaticTokenIdentityProvider {
    return new StaticTokenIdentityProvider(new Map([[token, { userId: 'admin', roles: ['admin'] }]]));
  }

  async authenticate(token: string): Promise<ApiIdentity | null> {
    for (const [known, identity] of this.tokens) {
      if (safeEqual(known, token)) {
        return identity;
      }
    }
    return null;
  }
}

/**
 * Resolve the identity behind a raw request. Used for upgrade requests, which
 * never pass through the express middleware chain.
 */
export async function authenticateRequest(
  req: IncomingMessage,
  identityProvider: IdentityProvider,
): Promise<ApiIdentity> {
  const token = extractBearerToken(req.headers.authorization);
  if (!token) {
    throw AuthenticationError.required();
  }

  let identity: ApiIdentity | null;
  try {
    identity = await identityProvider.authenticate(token);
  } catch (error) {
    throw new AuthenticationError(`Identity provider failed: ${toError(error).message}`);
  }
  if (!identity) {
    throw AuthenticationError.invalidCredentials('unknown token');
  }

  setIdentity(req, identity);
  return identity;
}

// ============================================================================
// Middleware
// ============================================================================

/**
 * Creates an authentication middleware. Failures are passed to the error
 * middleware as AuthenticationError.
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions): RequestHandler {
  const { identityProvider, skipOptionsRequests = true } = options;
  const logger = options.logger ?? createServiceLogger({ component: 'auth-middleware' });

  return async (req, _res, next): Promise<void> => {
    if (skipOptionsRequests && req.method === 'OPTIONS') {
      next();
      return;
    }

    try {
      const identity = await authenticateRequest(req, identityProvider);
      logger.debug('Authentication successful', {
        correlationId: correlationIdFor(req),
        userId: identity.userId,
        roles: identity.roles,
      });
      next();
    } catch (error) {
      logger.debug('Authentication failed', {
        correlationId: correlationIdFor(req),
        method: req.method,
        path: req.path,
        error: toError(error).message,
      });
      next(error);
    }
  };
}
