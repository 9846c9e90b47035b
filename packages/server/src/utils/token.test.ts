import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { bearerToken, issueToken, verifyToken } from './token.js';

describe('issueToken / verifyToken', () => {
  it('round-trips the user id for the matching type', () => {
    const token = issueToken(42, 'access');
    expect(verifyToken(token, 'access')).toEqual({ userId: 42, type: 'access' });
  });

  it('rejects a token of the other type', () => {
    expect(verifyToken(issueToken(42, 'refresh'), 'access')).toBeNull();
    expect(verifyToken(issueToken(42, 'access'), 'refresh')).toBeNull();
  });

  it('sets expiry from the configured lifetimes', () => {
    const access = jwt.decode(issueToken(7, 'access'));
    const refresh = jwt.decode(issueToken(7, 'refresh'));

    if (typeof access === 'string' || !access || typeof refresh === 'string' || !refresh) {
      throw new Error('expected object payloads');
    }
    expect(access.sub).toBe('7');
    expect(Number(access.exp) - Number(access.iat)).toBe(30 * 60);
    expect(Number(refresh.exp) - Number(refresh.iat)).toBe(7 * 24 * 60 * 60);
  });

  it('rejects expired, foreign and malformed tokens', () => {
    const now = Math.floor(Date.now() / 1000);
    const expired = jwt.sign({ sub: '1', type: 'access', iat: now - 120, exp: now - 60 }, 'test-secret');
    const foreign = jwt.sign({ sub: '1', type: 'access' }, 'other-secret');

    expect(verifyToken(expired, 'access')).toBeNull();
    expect(verifyToken(foreign, 'access')).toBeNull();
    expect(verifyToken('not-a-token', 'access')).toBeNull();
  });

  it('rejects a token without a numeric subject', () => {
    const token = jwt.sign({ sub: 'alice', type: 'access' }, 'test-secret');
    expect(verifyToken(token, 'access')).toBeNull();
  });
});

describe('bearerToken', () => {
  it('extracts the credential regardless of scheme case', () => {
    expect(bearerToken('Bearer abc.def')).toBe('abc.def');
    expect(bearerToken('bearer abc.def')).toBe('abc.def');
  });

  it('returns null for missing or non-bearer headers', () => {
    expect(bearerToken(undefined)).toBeNull();
    expect(bearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(bearerToken('Bearer')).toBeNull();
  });
});
