import { SupabaseClient } from '@supabase/supabase-js';
import type { FriendshipStatus } from '@notesnest/shared';
import { BaseRepository } from './base.repository.js';
import { UserRepository, type UserRow } from './user.repository.js';
import type {
  Friendship,
  FriendshipChanges,
  FriendshipStore,
  FriendshipWithUser,
} from './types.js';

interface FriendshipRow {
  id: number;
  requester_id: number;
  addressee_id: number;
  status: FriendshipStatus;
  created_at: string;
  updated_at: string;
}

interface FriendshipJoinedRow extends FriendshipRow {
  requester: UserRow;
  addressee: UserRow;
}

const JOINED_SELECT = `
  *,
  requester:user!friendship_requester_id_fkey(*),
  addressee:user!friendship_addressee_id_fkey(*)
`;

/**
 * Friendship repository - one row per user pair, direction preserved
 */
export class FriendshipRepository extends BaseRepository<FriendshipRow, Friendship> implements FriendshipStore {
  private users: UserRepository;

  constructor(supabase: SupabaseClient) {
    super(supabase, 'friendship');
    this.users = new UserRepository(supabase);
  }

  protected mapToEntity(row: FriendshipRow): Friendship {
    return {
      id: row.id,
      requesterId: row.requester_id,
      addresseeId: row.addressee_id,
      status: row.status,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  async findById(id: number): Promise<Friendship | null> {
    return this.findOneBy('id', id);
  }

  async findBetween(userA: number, userB: number): Promise<Friendship | null> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .or(
        `and(requester_id.eq.${userA},addressee_id.eq.${userB}),and(requester_id.eq.${userB},addressee_id.eq.${userA})`
      )
      .limit(1)
      .maybeSingle();

    if (error) {
      this.fail(error, { userA, userB }, 'Error finding friendship');
    }

    return data ? this.mapToEntity(data as FriendshipRow) : null;
  }

  async findPending(requesterId: number, addresseeId: number): Promise<Friendship | null> {
    return this.findOneBy('requester_id', requesterId, {
      addressee_id: addresseeId,
      status: 'pending',
    });
  }

  async create(requesterId: number, addresseeId: number): Promise<Friendship> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .insert({
        requester_id: requesterId,
        addressee_id: addresseeId,
        status: 'pending',
      })
      .select()
      .single();

    if (error) {
      this.fail(
        error,
        { requesterId, addresseeId },
        'Error creating friendship',
        'A relationship between these users already exists'
      );
    }

    return this.mapToEntity(data as FriendshipRow);
  }

  async replaceRejected(rejectedId: number, requesterId: number, addresseeId: number): Promise<Friendship> {
    const { data, error } = await this.supabase
      .rpc('replace_rejected_friendship', {
        p_friendship_id: rejectedId,
        p_requester_id: requesterId,
        p_addressee_id: addresseeId,
      })
      .single();

    if (error) {
      this.fail(
        error,
        { rejectedId, requesterId, addresseeId },
        'Error replacing rejected friendship',
        'A relationship between these users already exists'
      );
    }

    return this.mapToEntity(data as FriendshipRow);
  }

  async update(id: number, changes: FriendshipChanges): Promise<Friendship> {
    const updateData: Record<string, unknown> = {
      updated_at: new Date().toISOString(),
    };

    if (changes.status !== undefined) updateData.status = changes.status;

    return this.updateById(id, updateData);
  }

  async delete(id: number): Promise<void> {
    await this.deleteById(id);
  }

  /**
   * Accepted friendships in either direction, joined to the other user
   */
  async listAccepted(userId: number, offset: number, limit: number): Promise<FriendshipWithUser[]> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select(JOINED_SELECT)
      .eq('status', 'accepted')
      .or(`requester_id.eq.${userId},addressee_id.eq.${userId}`)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true })
      .range(offset, offset + limit - 1);

    if (error) {
      this.fail(error, { userId }, 'Error listing friends');
    }

    return (data as FriendshipJoinedRow[]).map(row => ({
      friendship: this.mapToEntity(row),
      friend: this.users.toEntity(row.requester_id === userId ? row.addressee : row.requester),
    }));
  }

  async countAccepted(userId: number): Promise<number> {
    const { count, error } = await this.supabase
      .from(this.tableName)
      .select('id', { count: 'exact', head: true })
      .eq('status', 'accepted')
      .or(`requester_id.eq.${userId},addressee_id.eq.${userId}`);

    if (error) {
      this.fail(error, { userId }, 'Error counting friends');
    }

    return count ?? 0;
  }

  async listPending(userId: number, side: 'requester' | 'addressee'): Promise<Friendship[]> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .eq(side === 'requester' ? 'requester_id' : 'addressee_id', userId)
      .eq('status', 'pending')
      .order('created_at', { ascending: true });

    if (error) {
      this.fail(error, { userId, side }, 'Error listing pending requests');
    }

    return (data as FriendshipRow[]).map(row => this.mapToEntity(row));
  }
}
