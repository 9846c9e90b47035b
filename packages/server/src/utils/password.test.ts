import { describe, it, expect } from 'vitest';
import {
  generateVerificationToken,
  hashPassword,
  passwordPolicyViolation,
  verifyPassword,
} from './password.js';

describe('passwordPolicyViolation', () => {
  it('accepts a password meeting every rule', () => {
    expect(passwordPolicyViolation('Abcdef1!')).toBeNull();
  });

  it('reports the first rule broken', () => {
    expect(passwordPolicyViolation('Ab1!')).toBe('Password must be at least 8 characters long');
    expect(passwordPolicyViolation('abcdefg1!')).toBe('Password must contain at least one uppercase letter');
    expect(passwordPolicyViolation('ABCDEFG1!')).toBe('Password must contain at least one lowercase letter');
    expect(passwordPolicyViolation('Abcdefgh!')).toBe('Password must contain at least one number');
    expect(passwordPolicyViolation('Abcdefgh1')).toBe('Password must contain at least one special character');
  });

  it('only counts symbols from the accepted set', () => {
    expect(passwordPolicyViolation('Abcdefg1~')).toBe('Password must contain at least one special character');
    expect(passwordPolicyViolation('Abcdefg1?')).toBeNull();
  });
});

describe('hashPassword', () => {
  it('produces a hash that verifies only the original password', async () => {
    const hash = await hashPassword('Abcdef1!');

    expect(hash).not.toBe('Abcdef1!');
    expect(await verifyPassword('Abcdef1!', hash)).toBe(true);
    expect(await verifyPassword('Abcdef1?', hash)).toBe(false);
  });
});

describe('generateVerificationToken', () => {
  it('returns distinct URL-safe tokens', () => {
    const first = generateVerificationToken();
    const second = generateVerificationToken();

    expect(first).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(first).not.toBe(second);
  });
});
