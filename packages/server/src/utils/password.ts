import bcrypt from 'bcrypt';
import crypto from 'crypto';
import { PASSWORD_MIN_LENGTH, PASSWORD_SPECIAL_CHARACTERS } from '@notesnest/shared';
import { config } from '../config/index.js';

const PASSWORD_RULES: Array<{ test: (password: string) => boolean; message: string }> = [
  {
    test: password => password.length >= PASSWORD_MIN_LENGTH,
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`,
  },
  {
    test: password => /[A-Z]/.test(password),
    message: 'Password must contain at least one uppercase letter',
  },
  {
    test: password => /[a-z]/.test(password),
    message: 'Password must contain at least one lowercase letter',
  },
  {
    test: password => /\d/.test(password),
    message: 'Password must contain at least one number',
  },
  {
    test: password => [...password].some(char => PASSWORD_SPECIAL_CHARACTERS.includes(char)),
    message: 'Password must contain at least one special character',
  },
];

/**
 * First password rule the value breaks, or null when it satisfies all of them
 */
export function passwordPolicyViolation(password: string): string | null {
  const failed = PASSWORD_RULES.find(rule => !rule.test(password));
  return failed ? failed.message : null;
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.auth.bcryptRounds);
}

export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  return bcrypt.compare(password, hashedPassword);
}

/**
 * Random URL-safe token for e-mail verification links
 */
export function generateVerificationToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}
