import type { UserRead, UserRole } from '@notesnest/shared';
import type { NoteAuthorStore, NoteStore, User, UserChanges, UserStore } from '../repositories/types.js';
import type { CreateUserInput, UpdateUserInput } from '../validators/user.validator.js';
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../middleware/error-handler.js';
import { generateVerificationToken, hashPassword, passwordPolicyViolation } from '../utils/password.js';
import { toUserRead } from '../utils/serializers.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('UserService');

/**
 * User service - account lifecycle and profile management
 */
export class UserService {
  constructor(
    private users: UserStore,
    private notes: NoteStore,
    private noteAuthors: NoteAuthorStore
  ) {}

  /**
   * Register an account. The verification token is stored for the
   * verify-email link and never returned.
   */
  async create(input: CreateUserInput): Promise<UserRead> {
    const violation = passwordPolicyViolation(input.password);
    if (violation) {
      throw new ValidationError(violation);
    }

    await this.assertUnique(input.email, input.username);

    const user = await this.users.create({
      username: input.username,
      email: input.email,
      name: input.name,
      age: input.age ?? null,
      bio: input.bio ?? null,
      hashedPassword: await hashPassword(input.password),
      emailVerificationToken: generateVerificationToken(),
    });

    logger.info({ userId: user.id }, 'User created');
    return toUserRead(user);
  }

  async get(id: number, actor: User): Promise<UserRead> {
    this.checkAccess(id, actor);
    return toUserRead(await this.findOrFail(id));
  }

  async list(skip: number, limit: number): Promise<UserRead[]> {
    const users = await this.users.list(skip, limit);
    return users.map(toUserRead);
  }

  /**
   * Apply profile changes; nested social links and address merge key by key
   */
  async update(id: number, input: UpdateUserInput, actor: User): Promise<UserRead> {
    this.checkAccess(id, actor);
    const user = await this.findOrFail(id);

    await this.assertUnique(
      input.email !== undefined && input.email !== user.email ? input.email : undefined,
      input.username !== undefined && input.username !== user.username ? input.username : undefined,
      id
    );

    const changes: UserChanges = {};
    if (input.username !== undefined) changes.username = input.username;
    if (input.email !== undefined) changes.email = input.email;
    if (input.name !== undefined) changes.name = input.name;
    if (input.age !== undefined) changes.age = input.age;
    if (input.bio !== undefined) changes.bio = input.bio;
    if (input.social_links) {
      changes.socialLinks = { ...user.socialLinks, ...input.social_links };
    }
    if (input.address) {
      changes.address = { ...user.address, ...input.address };
    }

    const updated = await this.users.update(id, changes);
    logger.info({ userId: id, fields: Object.keys(changes) }, 'User updated');
    return toUserRead(updated);
  }

  /**
   * Soft delete deactivates and stamps the row. Permanent delete removes it,
   * cascading friendships and author rows, and is refused while the user is
   * the creator or sole author of a note.
   */
  async delete(id: number, actor: User, permanent = false): Promise<void> {
    this.checkAccess(id, actor, true);

    const user = await this.users.findById(id, { includeDeleted: true });
    if (!user) {
      throw new NotFoundError('User');
    }

    if (!permanent) {
      await this.users.update(id, { deletedAt: new Date(), isActive: false });
      logger.info({ userId: id, actorId: actor.id }, 'User soft-deleted');
      return;
    }

    if ((await this.notes.countCreatedBy(id)) > 0) {
      throw new ConflictError('Cannot permanently delete a user who created notes; transfer or delete them first');
    }

    const authoredNoteIds = await this.noteAuthors.listNoteIdsForUser(id);
    for (const noteId of authoredNoteIds) {
      if ((await this.noteAuthors.countForNote(noteId)) <= 1) {
        throw new ConflictError(`Cannot permanently delete the sole author of note ${noteId}`);
      }
    }

    await this.users.delete(id);
    logger.info({ userId: id, actorId: actor.id }, 'User permanently deleted');
  }

  async changeRole(id: number, role: UserRole, actor: User): Promise<UserRead> {
    this.checkAccess(id, actor, true);
    await this.findOrFail(id);

    const updated = await this.users.update(id, { role });
    logger.info({ userId: id, role, actorId: actor.id }, 'User role changed');
    return toUserRead(updated);
  }

  /**
   * Single-use: the token is cleared once it verifies an address
   */
  async verifyEmail(token: string): Promise<void> {
    const user = await this.users.findByVerificationToken(token);
    if (!user) {
      throw new BadRequestError('Invalid verification token');
    }

    await this.users.update(user.id, {
      isEmailVerified: true,
      emailVerificationToken: null,
    });
    logger.info({ userId: user.id }, 'Email verified');
  }

  /**
   * Non-admins may only reach their own record; admin-only operations
   * reject every non-admin
   */
  checkAccess(targetId: number, actor: User, requireAdmin = false): void {
    const isAdmin = actor.role === 'admin';
    if (requireAdmin ? !isAdmin : !isAdmin && actor.id !== targetId) {
      throw new ForbiddenError('Access denied');
    }
  }

  private async findOrFail(id: number): Promise<User> {
    const user = await this.users.findById(id);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }

  private async assertUnique(email?: string, username?: string, excludeUserId?: number): Promise<void> {
    if (email !== undefined && (await this.users.existsWithEmail(email, excludeUserId))) {
      throw new BadRequestError('Email already registered');
    }
    if (username !== undefined && (await this.users.existsWithUsername(username, excludeUserId))) {
      throw new BadRequestError('Username already taken');
    }
  }
}
