/**
 * Authentication Middleware
 *
 * Validates bearer tokens and extracts the caller's organization and roles
 * from token claims. Signature verification belongs to the identity
 * provider in front of the API; this layer checks structure, audience and
 * expiry.
 *
 * @tested tests/security/authentication.property.test.ts
 * @edgecase a token without roles gets the viewer role of its organization type
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { OrganizationType, OrganizationTypeSchema } from '@supplier-compliance/shared';
import { createErrorResponse } from './error-handler.js';

/**
 * User roles in the system
 */
export type UserRole = 'CompanyAdmin' | 'CompanyViewer' | 'SupplierAdmin' | 'SupplierViewer';

export const USER_ROLES: readonly UserRole[] = ['CompanyAdmin', 'CompanyViewer', 'SupplierAdmin', 'SupplierViewer'];

/**
 * Authenticated user information extracted from token
 */
export interface AuthenticatedUser {
  userId: string;
  email: string;
  name: string;
  roles: UserRole[];
  organizationId: string;
  organizationType: OrganizationType;
  tokenExpiry: Date;
}

/**
 * Extended request with authenticated user
 */
export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

export interface TokenValidationResult {
  valid: boolean;
  user?: AuthenticatedUser;
  error?: string;
}

export interface AuthConfig {
  /** Expected `aud` claim */
  audience: string;
  tenantId: string;
  /** Development only: every request runs as a company admin */
  skipAuth?: boolean;
}

export const defaultAuthConfig: AuthConfig = {
  audience: 'api://supplier-compliance',
  tenantId: 'default-tenant',
  skipAuth: false,
};

const REQUIRED_CLAIMS = ['sub', 'aud', 'exp', 'iat', 'orgId', 'orgType'] as const;

const PayloadSchema = z.record(z.unknown());

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  aud: z.string(),
  exp: z.number(),
  iat: z.number(),
  orgId: z.string().min(1),
  orgType: OrganizationTypeSchema,
  roles: z.array(z.string()).default([]),
  email: z.string().default(''),
  name: z.string().default(''),
});

export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Three base64url segments
 */
export function validateTokenStructure(token: string): boolean {
  const parts = token.split('.');
  return parts.length === 3 && parts.every((part) => /^[A-Za-z0-9_-]+$/.test(part));
}

/**
 * Decodes the JWT payload without verifying the signature
 */
export function decodeTokenPayload(token: string): Record<string, unknown> | null {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'));
  } catch {
    return null;
  }
  const result = PayloadSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function isValidRole(role: string): role is UserRole {
  return USER_ROLES.some((known) => known === role);
}

/**
 * Known roles from the `roles` claim
 */
export function extractRoles(roles: readonly string[], organizationType: OrganizationType): UserRole[] {
  const known = roles.filter(isValidRole);
  if (known.length > 0) {
    return known;
  }
  return [organizationType === OrganizationType.COMPANY ? 'CompanyViewer' : 'SupplierViewer'];
}

export function validateToken(
  token: string,
  config: AuthConfig = defaultAuthConfig,
  now: Date = new Date()
): TokenValidationResult {
  if (!validateTokenStructure(token)) {
    return { valid: false, error: 'Invalid token structure' };
  }

  const payload = decodeTokenPayload(token);
  if (!payload) {
    return { valid: false, error: 'Failed to decode token payload' };
  }

  for (const claim of REQUIRED_CLAIMS) {
    if (!(claim in payload)) {
      return { valid: false, error: `Missing required claim: ${claim}` };
    }
  }

  const claims = TokenClaimsSchema.safeParse(payload);
  if (!claims.success) {
    return { valid: false, error: 'Invalid token claims' };
  }

  if (claims.data.aud !== config.audience) {
    return { valid: false, error: 'Invalid audience' };
  }

  if (claims.data.exp * 1000 < now.getTime()) {
    return { valid: false, error: 'Token has expired' };
  }

  return {
    valid: true,
    user: {
      userId: claims.data.sub,
      email: claims.data.email,
      name: claims.data.name,
      roles: extractRoles(claims.data.roles, claims.data.orgType),
      organizationId: claims.data.orgId,
      organizationType: claims.data.orgType,
      tokenExpiry: new Date(claims.data.exp * 1000),
    },
  };
}

/**
 * Creates an unsigned token for development and tests
 */
export function createMockToken(
  user: Partial<AuthenticatedUser>,
  options: { audience?: string; expiresInSeconds?: number } = {}
): string {
  const issuedAt = Math.floor(Date.now() / 1000);
  const header = { alg: 'RS256', typ: 'JWT' };
  const payload = {
    sub: user.userId ?? 'mock-user-id',
    email: user.email ?? 'mock@example.com',
    name: user.name ?? 'Mock User',
    roles: user.roles ?? ['CompanyAdmin'],
    orgId: user.organizationId ?? 'mock-company',
    orgType: user.organizationType ?? OrganizationType.COMPANY,
    aud: options.audience ?? defaultAuthConfig.audience,
    iat: issuedAt,
    exp: issuedAt + (options.expiresInSeconds ?? 3600),
  };

  const encodeBase64Url = (obj: object) => Buffer.from(JSON.stringify(obj)).toString('base64url');

  return `${encodeBase64Url(header)}.${encodeBase64Url(payload)}.mock-signature`;
}

function correlationIdOf(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Rejects requests without a valid bearer token with 401
 */
export function authMiddleware(config: AuthConfig = defaultAuthConfig) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (config.skipAuth) {
      req.user = {
        userId: 'dev-user',
        email: 'dev@example.com',
        name: 'Development User',
        roles: ['CompanyAdmin'],
        organizationId: 'dev-company',
        organizationType: OrganizationType.COMPANY,
        tokenExpiry: new Date(Date.now() + 3600000),
      };
      next();
      return;
    }

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      res.status(401).json(
        createErrorResponse(
          'Unauthorized',
          'Missing or invalid Authorization header. Bearer token required.',
          correlationIdOf(req)
        )
      );
      return;
    }

    const validationResult = validateToken(token, config);
    if (!validationResult.valid || !validationResult.user) {
      res.status(401).json(
        createErrorResponse('Unauthorized', validationResult.error ?? 'Invalid token', correlationIdOf(req))
      );
      return;
    }

    req.user = validationResult.user;
    next();
  };
}
