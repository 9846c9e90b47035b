import type { TokenResponse } from '@notesnest/shared';
import type { User, UserStore } from '../repositories/types.js';
import { UnauthorizedError } from '../middleware/error-handler.js';
import { verifyPassword } from '../utils/password.js';
import { issueToken, verifyToken } from '../utils/token.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('AuthService');

/**
 * Auth service - credential checks and token pairs
 */
export class AuthService {
  constructor(private users: UserStore) {}

  /**
   * Exchange an e-mail and password for a token pair
   */
  async login(email: string, password: string): Promise<TokenResponse> {
    const user = await this.users.findByEmail(email);

    if (!user || !(await verifyPassword(password, user.hashedPassword))) {
      logger.warn('Login rejected: bad credentials');
      throw new UnauthorizedError('Incorrect email or password');
    }

    if (!user.isActive) {
      logger.warn({ userId: user.id }, 'Login rejected: account disabled');
      throw new UnauthorizedError('User account is disabled');
    }

    logger.info({ userId: user.id }, 'User logged in');
    return this.createTokens(user);
  }

  /**
   * Issue a new pair from a valid refresh token
   */
  async refresh(refreshToken: string): Promise<TokenResponse> {
    const claims = verifyToken(refreshToken, 'refresh');
    if (!claims) {
      throw new UnauthorizedError('Invalid refresh token');
    }

    const user = await this.users.findById(claims.userId);
    if (!user || !user.isActive) {
      logger.warn({ userId: claims.userId }, 'Refresh rejected: account unavailable');
      throw new UnauthorizedError('User is inactive or deleted');
    }

    return this.createTokens(user);
  }

  createTokens(user: User): TokenResponse {
    return {
      access_token: issueToken(user.id, 'access'),
      refresh_token: issueToken(user.id, 'refresh'),
      token_type: 'bearer',
    };
  }
}
