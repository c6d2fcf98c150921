/**
 * Role-Based Access Control (RBAC) Middleware
 *
 * Uses CASL to decide which environments an identity may read or proxy to.
 *
 * @module @tidewater/server/middleware/rbac-middleware
 */

import { AbilityBuilder, createMongoAbility, type MongoAbility, type MongoQuery } from '@casl/ability';
import type { RequestHandler } from 'express';
import { AuthorizationError, createServiceLogger, type Logger } from '@tidewater/shared';
import type { ApiIdentity } from './auth-middleware.js';
import { correlationIdFor, getIdentity } from './request-context.js';

// ============================================================================
// Types
// ============================================================================

/**
 * `proxy` forwards calls to the environment; `read` sees its status
 */
export type EnvironmentAction = 'proxy' | 'read' | 'manage';

export interface EnvironmentSubject {
  kind: 'Environment';
  id: string;
}

type Subject = 'Environment' | EnvironmentSubject | 'all';

export type AppAbility = MongoAbility<[EnvironmentAction, Subject], MongoQuery>;

/**
 * External authorization capability
 */
export interface AccessPolicy {
  canAccess(identity: ApiIdentity, environmentId: string, action: EnvironmentAction): boolean | Promise<boolean>;
}

// ============================================================================
// Ability Definitions
// ============================================================================

/**
 * Role permissions:
 * - admin: everything
 * - operator: read and proxy, optionally limited to `environmentIds`
 * - viewer: read only, optionally limited to `environmentIds`
 */
export function defineAbilityFor(identity: ApiIdentity): AppAbility {
  const { can, build } = new AbilityBuilder<AppAbility>(createMongoAbility);
  const scope = identity.environmentIds ? { id: { $in: identity.environmentIds } } : undefined;

  for (const role of identity.roles) {
    switch (role) {
      case 'admin':
        can('manage', 'all');
        break;
      case 'operator':
        can(['read', 'proxy'], 'Environment', scope);
        break;
      case 'viewer':
        can('read', 'Environment', scope);
        break;
    }
  }

  return build({ detectSubjectType: (object) => object.kind });
}

/**
 * Default policy backed by the role abilities above
 */
export class RoleAccessPolicy implements AccessPolicy {
  canAccess(identity: ApiIdentity, environmentId: string, action: EnvironmentAction): boolean {
    return defineAbilityFor(identity).can(action, { kind: 'Environment', id: environmentId });
  }
}

/**
 * Throws AuthorizationError unless the policy allows the action
 */
export async function authorizeEnvironment(
  policy: AccessPolicy,
  identity: ApiIdentity,
  environmentId: string,
  action: EnvironmentAction,
): Promise<void> {
  if (!(await policy.canAccess(identity, environmentId, action))) {
    throw AuthorizationError.environmentAccessDenied(environmentId, identity.userId);
  }
}

// ============================================================================
// Middleware
// ============================================================================

export interface EnvironmentAccessOptions {
  policy: AccessPolicy;
  action: EnvironmentAction;
  logger?: Logger;
}

/**
 * Checks access to `req.params.environmentId`. Requests without an identity
 * pass, since that only happens with authentication disabled.
 */
export function requireEnvironmentAccess(options: EnvironmentAccessOptions): RequestHandler {
  const logger = options.logger ?? createServiceLogger({ component: 'rbac-middleware' });

  return async (req, _res, next): Promise<void> => {
    const identity = getIdentity(req);
    const environmentId = req.params.environmentId;
    if (!identity || !environmentId) {
      next();
      return;
    }

    try {
      await authorizeEnvironment(options.policy, identity, environmentId, options.action);
      next();
    } catch (error) {
      logger.debug('Access denied', {
        correlationId: correlationIdFor(req),
        userId: identity.userId,
        environmentId,
        action: options.action,
      });
      next(error);
    }
  };
}
