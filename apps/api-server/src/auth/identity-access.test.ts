import { describe, expect, it } from 'vitest';
import { credentialFromRequest } from './identity-access';

describe('credentialFromRequest', () => {
  it('prefers the bearer header over the cookie', () => {
    expect(
      credentialFromRequest({
        authorizationHeader: 'Bearer header-token',
        cookieToken: 'cookie-token',
      }),
    ).toBe('header-token');
  });

  it('accepts a lowercase scheme', () => {
    expect(
      credentialFromRequest({
        authorizationHeader: 'bearer   header-token ',
        cookieToken: undefined,
      }),
    ).toBe('header-token');
  });

  it('falls back to the cookie for other schemes', () => {
    expect(
      credentialFromRequest({
        authorizationHeader: 'Basic dXNlcjpwYXNz',
        cookieToken: 'cookie-token',
      }),
    ).toBe('cookie-token');
  });

  it('returns null when neither carries a credential', () => {
    expect(
      credentialFromRequest({
        authorizationHeader: undefined,
        cookieToken: '  ',
      }),
    ).toBeNull();
  });
});
