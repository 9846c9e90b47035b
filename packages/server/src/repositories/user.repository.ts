import { SupabaseClient } from '@supabase/supabase-js';
import type { Address, SocialLinks, UserRole } from '@notesnest/shared';
import { DEFAULT_ADDRESS, DEFAULT_SOCIAL_LINKS } from '@notesnest/shared';
import { BaseRepository } from './base.repository.js';
import type { NewUser, User, UserChanges, UserStore } from './types.js';

export interface UserRow {
  id: number;
  username: string;
  email: string;
  name: string;
  age: number | null;
  bio: string | null;
  hashed_password: string;
  role: UserRole;
  is_active: boolean;
  is_email_verified: boolean;
  email_verification_token: string | null;
  social_links: Partial<SocialLinks> | null;
  address: Partial<Address> | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

/**
 * User repository for account records
 */
export class UserRepository extends BaseRepository<UserRow, User> implements UserStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'user');
  }

  protected mapToEntity(row: UserRow): User {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      name: row.name,
      age: row.age,
      bio: row.bio,
      hashedPassword: row.hashed_password,
      role: row.role,
      isActive: row.is_active,
      isEmailVerified: row.is_email_verified,
      emailVerificationToken: row.email_verification_token,
      socialLinks: { ...DEFAULT_SOCIAL_LINKS, ...row.social_links },
      address: { ...DEFAULT_ADDRESS, ...row.address },
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      deletedAt: row.deleted_at ? new Date(row.deleted_at) : null,
    };
  }

  /**
   * Map a user row embedded in another table's query
   */
  toEntity(row: UserRow): User {
    return this.mapToEntity(row);
  }

  async findById(id: number, options?: { includeDeleted?: boolean }): Promise<User | null> {
    return this.findOneBy('id', id, options?.includeDeleted ? undefined : { deleted_at: null });
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOneBy('email', email);
  }

  async findByVerificationToken(token: string): Promise<User | null> {
    return this.findOneBy('email_verification_token', token);
  }

  async existsWithEmail(email: string, excludeUserId?: number): Promise<boolean> {
    return this.existsWith('email', email, excludeUserId);
  }

  async existsWithUsername(username: string, excludeUserId?: number): Promise<boolean> {
    return this.existsWith('username', username, excludeUserId);
  }

  /**
   * List accounts that are not soft-deleted
   */
  async list(offset: number, limit: number): Promise<User[]> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .is('deleted_at', null)
      .order('id', { ascending: true })
      .range(offset, offset + limit - 1);

    if (error) {
      this.fail(error, { offset, limit }, 'Error listing users');
    }

    return (data as UserRow[]).map(row => this.mapToEntity(row));
  }

  async create(data: NewUser): Promise<User> {
    const { data: created, error } = await this.supabase
      .from(this.tableName)
      .insert({
        username: data.username,
        email: data.email,
        name: data.name,
        age: data.age,
        bio: data.bio,
        hashed_password: data.hashedPassword,
        email_verification_token: data.emailVerificationToken,
        social_links: DEFAULT_SOCIAL_LINKS,
        address: DEFAULT_ADDRESS,
      })
      .select()
      .single();

    if (error) {
      this.fail(error, { username: data.username }, 'Error creating user', 'Email or username already registered');
    }

    this.logger.info({ userId: created.id }, 'User row inserted');
    return this.mapToEntity(created as UserRow);
  }

  async update(id: number, changes: UserChanges): Promise<User> {
    const updateData: Record<string, unknown> = {
      updated_at: new Date().toISOString(),
    };

    if (changes.username !== undefined) updateData.username = changes.username;
    if (changes.email !== undefined) updateData.email = changes.email;
    if (changes.name !== undefined) updateData.name = changes.name;
    if (changes.age !== undefined) updateData.age = changes.age;
    if (changes.bio !== undefined) updateData.bio = changes.bio;
    if (changes.role !== undefined) updateData.role = changes.role;
    if (changes.isActive !== undefined) updateData.is_active = changes.isActive;
    if (changes.isEmailVerified !== undefined) updateData.is_email_verified = changes.isEmailVerified;
    if (changes.emailVerificationToken !== undefined) {
      updateData.email_verification_token = changes.emailVerificationToken;
    }
    if (changes.socialLinks !== undefined) updateData.social_links = changes.socialLinks;
    if (changes.address !== undefined) updateData.address = changes.address;
    if (changes.deletedAt !== undefined) {
      updateData.deleted_at = changes.deletedAt ? changes.deletedAt.toISOString() : null;
    }

    return this.updateById(id, updateData);
  }

  async delete(id: number): Promise<void> {
    await this.deleteById(id);
  }

  private async existsWith(
    column: 'email' | 'username',
    value: string,
    excludeUserId?: number
  ): Promise<boolean> {
    let query = this.supabase
      .from(this.tableName)
      .select('id', { count: 'exact', head: true })
      .eq(column, value);

    if (excludeUserId !== undefined) {
      query = query.neq('id', excludeUserId);
    }

    const { count, error } = await query;

    if (error) {
      this.fail(error, { column }, 'Error checking uniqueness');
    }

    return (count ?? 0) > 0;
  }
}
