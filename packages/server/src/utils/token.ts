import jwt from 'jsonwebtoken';
import type { TokenType } from '@notesnest/shared';
import { config } from '../config/index.js';
import { createLogger } from './logger.js';

const logger = createLogger('Token');

export interface TokenClaims {
  userId: number;
  type: TokenType;
}

function lifetimeSeconds(type: TokenType): number {
  return type === 'access'
    ? config.auth.accessTokenExpireMinutes * 60
    : config.auth.refreshTokenExpireDays * 24 * 60 * 60;
}

/**
 * Sign a token for a user; `sub` carries the id as a string
 */
export function issueToken(userId: number, type: TokenType): string {
  return jwt.sign({ sub: String(userId), type }, config.auth.secretKey, {
    algorithm: config.auth.algorithm,
    expiresIn: lifetimeSeconds(type),
  });
}

/**
 * Verify signature, expiry and type. Any failure yields null.
 */
export function verifyToken(token: string, expectedType: TokenType): TokenClaims | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, config.auth.secretKey, {
      algorithms: [config.auth.algorithm],
    });
  } catch (error) {
    logger.debug({ reason: error instanceof Error ? error.name : 'unknown' }, 'Token rejected');
    return null;
  }

  if (typeof decoded === 'string' || decoded.type !== expectedType || !decoded.sub) {
    return null;
  }

  const userId = Number(decoded.sub);
  if (!Number.isInteger(userId) || userId <= 0) {
    return null;
  }

  return { userId, type: expectedType };
}

/**
 * Extract the credential from an `Authorization: Bearer <token>` header
 */
export function bearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    return null;
  }
  return token;
}
