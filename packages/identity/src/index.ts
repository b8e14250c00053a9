import { IdentityVerificationError, normalizeEmail, type VerifiedIdentity } from '@activityhub/core-domain';
import { z } from 'zod';

export const DEFAULT_TOKENINFO_ENDPOINT = 'https://oauth2.googleapis.com/tokeninfo';

const CLOCK_SKEW_SECONDS = 60;

export interface IdentityVerifier {
  verify(credential: string): Promise<VerifiedIdentity>;
}

/**
 * Claims shared by a tokeninfo response and a decoded ID token. Tokeninfo reports numeric and
 * boolean claims as strings, so both spellings are accepted.
 */
export const identityClaimsSchema = z
  .object({
    iss: z.string().min(1).optional(),
    sub: z.string().min(1).optional(),
    aud: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    exp: z.coerce.number().int().positive(),
    iat: z.coerce.number().int().positive().optional(),
    email: z.string().email(),
    email_verified: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
    name: z.string().min(1).optional(),
  })
  .passthrough();

export type IdentityClaims = z.infer<typeof identityClaimsSchema>;

export const parseIdentityClaims = (input: unknown): IdentityClaims => {
  const parsed = identityClaimsSchema.safeParse(input);

  if (!parsed.success) {
    throw new IdentityVerificationError('credential claims are malformed');
  }

  return parsed.data;
};

const nowEpochSeconds = (now: () => Date): number => {
  return Math.floor(now().getTime() / 1000);
};

export const verifyIdentityClaims = (
  claims: IdentityClaims,
  input: {
    audience: string;
    nowEpochSeconds: number;
  },
): VerifiedIdentity => {
  const audiences = Array.isArray(claims.aud) ? claims.aud : [claims.aud];

  if (!audiences.includes(input.audience)) {
    throw new IdentityVerificationError('credential audience does not match');
  }

  if (claims.exp <= input.nowEpochSeconds) {
    throw new IdentityVerificationError('credential has expired');
  }

  if (claims.iat !== undefined && claims.iat > input.nowEpochSeconds + CLOCK_SKEW_SECONDS) {
    throw new IdentityVerificationError('credential iat is in the future');
  }

  if (claims.email_verified !== true && claims.email_verified !== 'true') {
    throw new IdentityVerificationError('credential email is not verified');
  }

  return {
    email: normalizeEmail(claims.email),
    name: claims.name ?? null,
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const parseCompactJwsSegmentObject = (segment: string | undefined): Record<string, unknown> | null => {
  if (segment === undefined || segment.length === 0) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const parseCompactJwsParts = (
  compactJws: string,
): { header: Record<string, unknown>; payload: Record<string, unknown> } | null => {
  const segments = compactJws.split('.');

  if (segments.length !== 3) {
    return null;
  }

  const header = parseCompactJwsSegmentObject(segments[0]);
  const payload = parseCompactJwsSegmentObject(segments[1]);

  if (header === null || payload === null) {
    return null;
  }

  return {
    header,
    payload,
  };
};

const encodeSegment = (value: Record<string, unknown>): string => {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
};

/**
 * Builds a compact token that only the unsigned verifier accepts. Used for local runs and tests.
 */
export const encodeUnsignedIdentityToken = (claims: Record<string, unknown>): string => {
  return `${encodeSegment({ alg: 'RS256', typ: 'JWT', kid: 'local-unsigned' })}.${encodeSegment(claims)}.unsigned`;
};

export interface TokenInfoIdentityVerifierInput {
  audience: string;
  endpoint?: string | undefined;
  fetch?: typeof fetch | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Delegates signature checks to the provider's tokeninfo endpoint, then checks audience, expiry
 * and email verification locally.
 */
export const createTokenInfoIdentityVerifier = (
  input: TokenInfoIdentityVerifierInput,
): IdentityVerifier => {
  const endpoint = input.endpoint ?? DEFAULT_TOKENINFO_ENDPOINT;
  const fetchImpl = input.fetch ?? fetch;
  const now = input.now ?? (() => new Date());

  return {
    verify: async (credential) => {
      const idToken = credential.trim();

      if (idToken.length === 0) {
        throw new IdentityVerificationError('credential is empty');
      }

      const url = new URL(endpoint);
      url.searchParams.set('id_token', idToken);
      let response: Response;

      try {
        response = await fetchImpl(url.toString(), {
          method: 'GET',
          headers: {
            accept: 'application/json',
          },
        });
      } catch (error: unknown) {
        throw new IdentityVerificationError(
          `tokeninfo request failed: ${error instanceof Error ? error.message : 'unknown error'}`,
        );
      }

      if (!response.ok) {
        throw new IdentityVerificationError(
          `tokeninfo rejected credential with status ${String(response.status)}`,
        );
      }

      let body: unknown;

      try {
        body = await response.json();
      } catch {
        throw new IdentityVerificationError('tokeninfo returned invalid JSON');
      }

      return verifyIdentityClaims(parseIdentityClaims(body), {
        audience: input.audience,
        nowEpochSeconds: nowEpochSeconds(now),
      });
    },
  };
};

export interface UnsignedTokenIdentityVerifierInput {
  audience: string;
  now?: (() => Date) | undefined;
}

/**
 * Decodes the token locally without checking its signature. Only enabled when
 * IDENTITY_ALLOW_UNSIGNED_TOKENS is set.
 */
export const createUnsignedTokenIdentityVerifier = (
  input: UnsignedTokenIdentityVerifierInput,
): IdentityVerifier => {
  const now = input.now ?? (() => new Date());

  return {
    verify: async (credential) => {
      const parts = parseCompactJwsParts(credential.trim());

      if (parts === null) {
        throw new IdentityVerificationError('credential must be a compact JWS with JSON header and payload');
      }

      const algorithm = parts.header.alg;

      if (typeof algorithm !== 'string' || algorithm.length === 0 || algorithm.toLowerCase() === 'none') {
        throw new IdentityVerificationError('credential must specify a JOSE alg and must not use "none"');
      }

      return verifyIdentityClaims(parseIdentityClaims(parts.payload), {
        audience: input.audience,
        nowEpochSeconds: nowEpochSeconds(now),
      });
    },
  };
};
