import { SupabaseClient } from '@supabase/supabase-js';
import { BaseRepository } from './base.repository.js';
import type {
  NoteAuthor,
  NoteAuthorStore,
  NoteAuthorWithUser,
  RemoveAuthorResult,
} from './types.js';

interface NoteAuthorRow {
  note_id: number;
  user_id: number;
  added_at: string;
  added_by_user_id: number | null;
}

interface NoteAuthorJoinedRow extends NoteAuthorRow {
  author: { id: number; username: string; name: string };
}

const REMOVE_RESULTS: readonly RemoveAuthorResult[] = ['removed', 'not_author', 'last_author'];

function isRemoveResult(value: unknown): value is RemoveAuthorResult {
  return REMOVE_RESULTS.some(result => result === value);
}

/**
 * Note author repository - (note_id, user_id) association rows
 */
export class NoteAuthorRepository extends BaseRepository<NoteAuthorRow, NoteAuthor> implements NoteAuthorStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'noteauthor');
  }

  protected mapToEntity(row: NoteAuthorRow): NoteAuthor {
    return {
      noteId: row.note_id,
      userId: row.user_id,
      addedAt: new Date(row.added_at),
      addedByUserId: row.added_by_user_id,
    };
  }

  async find(noteId: number, userId: number): Promise<NoteAuthor | null> {
    return this.findOneBy('note_id', noteId, { user_id: userId });
  }

  async listForNote(noteId: number): Promise<NoteAuthorWithUser[]> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*, author:user!noteauthor_user_id_fkey(id, username, name)')
      .eq('note_id', noteId)
      .order('added_at', { ascending: true });

    if (error) {
      this.fail(error, { noteId }, 'Error listing note authors');
    }

    return (data as NoteAuthorJoinedRow[]).map(row => ({
      ...this.mapToEntity(row),
      user: {
        id: row.author.id,
        username: row.author.username,
        name: row.author.name,
      },
    }));
  }

  async countForNote(noteId: number): Promise<number> {
    const { count, error } = await this.supabase
      .from(this.tableName)
      .select('user_id', { count: 'exact', head: true })
      .eq('note_id', noteId);

    if (error) {
      this.fail(error, { noteId }, 'Error counting note authors');
    }

    return count ?? 0;
  }

  async add(noteId: number, userId: number, addedByUserId: number): Promise<NoteAuthor> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .insert({
        note_id: noteId,
        user_id: userId,
        added_by_user_id: addedByUserId,
      })
      .select()
      .single();

    if (error) {
      this.fail(
        error,
        { noteId, userId },
        'Error adding note author',
        `User ${userId} is already an author of note ${noteId}`
      );
    }

    return this.mapToEntity(data as NoteAuthorRow);
  }

  /**
   * Runs `remove_note_author`, which locks the note row so concurrent removals
   * cannot leave it without authors
   */
  async remove(noteId: number, userId: number): Promise<RemoveAuthorResult> {
    const { data, error } = await this.supabase.rpc('remove_note_author', {
      p_note_id: noteId,
      p_user_id: userId,
    });

    if (error) {
      this.fail(error, { noteId, userId }, 'Error removing note author');
    }

    if (!isRemoveResult(data)) {
      this.logger.error({ noteId, userId, result: data }, 'Unexpected remove_note_author result');
      throw new Error('Unexpected result while removing note author');
    }

    return data;
  }

  async listNoteIdsForUser(userId: number): Promise<number[]> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('note_id')
      .eq('user_id', userId);

    if (error) {
      this.fail(error, { userId }, 'Error listing authored notes');
    }

    return (data as Array<{ note_id: number }>).map(row => row.note_id);
  }
}
