/**
 * Role-Based Access Control (RBAC) Middleware
 *
 * Company roles act on suppliers, requirements and questionnaires; supplier
 * roles act on invitations, assigned requirements and their CheckFix link.
 * Viewers read, admins write.
 *
 * @tested tests/security/rbac.property.test.ts
 */

import { Response, NextFunction } from 'express';
import { type AuthenticatedRequest, type UserRole, USER_ROLES } from './auth.js';
import { createErrorResponse } from './error-handler.js';

/**
 * Actions that can be performed in the system
 */
export type Action =
  | 'view:suppliers'
  | 'manage:suppliers'
  | 'view:requirements'
  | 'manage:requirements'
  | 'review:requirements'
  | 'view:questionnaires'
  | 'manage:questionnaires'
  | 'view:templates'
  | 'manage:templates'
  | 'view:invitations'
  | 'respond:invitations'
  | 'view:assignments'
  | 'submit:responses'
  | 'view:checkfix'
  | 'manage:checkfix'
  | 'view:organization'
  | 'manage:organization'
  | 'view:audit';

export const rolePermissions: Record<UserRole, Action[]> = {
  CompanyAdmin: [
    'view:suppliers',
    'manage:suppliers',
    'view:requirements',
    'manage:requirements',
    'review:requirements',
    'view:questionnaires',
    'manage:questionnaires',
    'view:templates',
    'manage:templates',
    'view:organization',
    'manage:organization',
    'view:audit',
  ],
  CompanyViewer: [
    'view:suppliers',
    'view:requirements',
    'view:questionnaires',
    'view:templates',
    'view:organization',
    'view:audit',
  ],
  SupplierAdmin: [
    'view:invitations',
    'respond:invitations',
    'view:assignments',
    'submit:responses',
    'view:checkfix',
    'manage:checkfix',
    'view:organization',
    'manage:organization',
  ],
  SupplierViewer: ['view:invitations', 'view:assignments', 'view:checkfix', 'view:organization'],
};

export function hasPermission(role: UserRole, action: Action): boolean {
  return rolePermissions[role].includes(action);
}

export function userHasPermission(roles: readonly UserRole[], action: Action): boolean {
  return roles.some((role) => hasPermission(role, action));
}

export function getPermissionsForRoles(roles: readonly UserRole[]): Action[] {
  const permissions = new Set<Action>();
  for (const role of roles) {
    for (const perm of rolePermissions[role]) {
      permissions.add(perm);
    }
  }
  return Array.from(permissions);
}

export function getRequiredRolesForAction(action: Action): UserRole[] {
  return USER_ROLES.filter((role) => hasPermission(role, action));
}

/**
 * 401 without a user, 403 when none of the user's roles grants the action
 */
export function requirePermission(action: Action) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const correlationId = req.headers['x-correlation-id'];
    const correlation = typeof correlationId === 'string' ? correlationId : undefined;

    if (!req.user) {
      res.status(401).json(createErrorResponse('Unauthorized', 'Authentication required', correlation));
      return;
    }

    if (!userHasPermission(req.user.roles, action)) {
      res.status(403).json({
        error: 'Forbidden',
        message: `You do not have permission to perform this action: ${action}`,
        requiredRole: getRequiredRolesForAction(action).join(' or '),
        userRoles: req.user.roles,
        correlationId: correlation,
      });
      return;
    }

    next();
  };
}

/**
 * Requires any of the given roles
 */
export function requireRole(...roles: UserRole[]) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json(createErrorResponse('Unauthorized', 'Authentication required'));
      return;
    }

    if (!req.user.roles.some((userRole) => roles.includes(userRole))) {
      res.status(403).json({
        error: 'Forbidden',
        message: `This action requires one of the following roles: ${roles.join(', ')}`,
        requiredRole: roles.join(' or '),
        userRoles: req.user.roles,
      });
      return;
    }

    next();
  };
}
