import type { UserRole } from '@notesnest/shared';
import type { Stores, User, UserChanges } from '../repositories/types.js';
import { hashPassword } from '../utils/password.js';
import { issueToken } from '../utils/token.js';

export const TEST_PASSWORD = 'Test-pass1';

export interface SeedUserOptions {
  role?: UserRole;
  isActive?: boolean;
}

/**
 * Insert an account named `username` with e-mail `<username>@example.com`,
 * password TEST_PASSWORD and verification token `verify-<username>`
 */
export async function seedUser(
  stores: Stores,
  username: string,
  options: SeedUserOptions = {}
): Promise<User> {
  const user = await stores.users.create({
    username,
    email: `${username}@example.com`,
    name: username.charAt(0).toUpperCase() + username.slice(1),
    age: null,
    bio: null,
    hashedPassword: await hashPassword(TEST_PASSWORD),
    emailVerificationToken: `verify-${username}`,
  });

  const changes: UserChanges = {};
  if (options.role !== undefined) changes.role = options.role;
  if (options.isActive !== undefined) changes.isActive = options.isActive;

  return Object.keys(changes).length > 0 ? stores.users.update(user.id, changes) : user;
}

export function bearer(user: User): string {
  return `Bearer ${issueToken(user.id, 'access')}`;
}
