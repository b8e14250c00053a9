import { IdentityVerificationError } from '@activityhub/core-domain';
import type { IdentityVerifier } from '@activityhub/identity';
import type { MiddlewareHandler } from 'hono';
import { getCookie } from 'hono/cookie';
import type { AppEnv } from '../app';

export const INSTRUCTOR_TOKEN_COOKIE = 'instructor_token';

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Prefers an `Authorization: Bearer` header over the dashboard cookie.
 */
export const credentialFromRequest = (input: {
  authorizationHeader: string | undefined;
  cookieToken: string | undefined;
}): string | null => {
  const header = input.authorizationHeader?.trim();

  if (header !== undefined && BEARER_PREFIX.test(header)) {
    const token = header.replace(BEARER_PREFIX, '').trim();
    return token.length === 0 ? null : token;
  }

  const cookieToken = input.cookieToken?.trim();
  return cookieToken === undefined || cookieToken.length === 0 ? null : cookieToken;
};

export interface IdentityAccessHelpers {
  requireIdentity: MiddlewareHandler<AppEnv>;
}

export const createIdentityAccessHelpers = (input: {
  identityVerifier: IdentityVerifier;
}): IdentityAccessHelpers => {
  const { identityVerifier } = input;

  return {
    requireIdentity: async (c, next) => {
      const credential = credentialFromRequest({
        authorizationHeader: c.req.header('authorization'),
        cookieToken: getCookie(c, INSTRUCTOR_TOKEN_COOKIE),
      });

      if (credential === null) {
        throw new IdentityVerificationError('credential is missing');
      }

      c.set('identity', await identityVerifier.verify(credential));
      await next();
    },
  };
};
