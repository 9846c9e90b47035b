import { SupabaseClient } from '@supabase/supabase-js';
import type { NotePrivacy } from '@notesnest/shared';
import { BaseRepository } from './base.repository.js';
import { NoteAuthorRepository } from './note-author.repository.js';
import type {
  NewNote,
  Note,
  NoteChanges,
  NoteListQuery,
  NoteStore,
  NoteWithAuthorCount,
} from './types.js';

interface NoteRow {
  id: number;
  title: string;
  content: string;
  privacy: NotePrivacy;
  created_by_user_id: number;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

interface NoteListRow extends NoteRow {
  noteauthor: Array<{ count: number }>;
}

/**
 * Note repository - content rows; authorship lives in `noteauthor`
 */
export class NoteRepository extends BaseRepository<NoteRow, Note> implements NoteStore {
  private authors: NoteAuthorRepository;

  constructor(supabase: SupabaseClient) {
    super(supabase, 'note');
    this.authors = new NoteAuthorRepository(supabase);
  }

  protected mapToEntity(row: NoteRow): Note {
    return {
      id: row.id,
      title: row.title,
      content: row.content,
      privacy: row.privacy,
      createdByUserId: row.created_by_user_id,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      deletedAt: row.deleted_at ? new Date(row.deleted_at) : null,
    };
  }

  async findById(id: number, options?: { includeDeleted?: boolean }): Promise<Note | null> {
    return this.findOneBy('id', id, options?.includeDeleted ? undefined : { deleted_at: null });
  }

  /**
   * Runs `create_note_with_author`, which inserts the note and the creator's
   * author row in a single transaction
   */
  async createWithAuthor(data: NewNote): Promise<Note> {
    const { data: created, error } = await this.supabase
      .rpc('create_note_with_author', {
        p_title: data.title,
        p_content: data.content,
        p_privacy: data.privacy,
        p_creator_id: data.createdByUserId,
      })
      .single();

    if (error) {
      this.fail(error, { creatorId: data.createdByUserId }, 'Error creating note');
    }

    return this.mapToEntity(created as NoteRow);
  }

  async update(id: number, changes: NoteChanges): Promise<Note> {
    const updateData: Record<string, unknown> = {
      updated_at: new Date().toISOString(),
    };

    if (changes.title !== undefined) updateData.title = changes.title;
    if (changes.content !== undefined) updateData.content = changes.content;
    if (changes.privacy !== undefined) updateData.privacy = changes.privacy;
    if (changes.createdByUserId !== undefined) updateData.created_by_user_id = changes.createdByUserId;

    return this.updateById(id, updateData);
  }

  async softDelete(id: number): Promise<void> {
    const { error } = await this.supabase
      .from(this.tableName)
      .update({ deleted_at: new Date().toISOString() })
      .eq('id', id);

    if (error) {
      this.fail(error, { id }, 'Error soft-deleting note');
    }
  }

  /**
   * Permanently remove a note; its author rows cascade
   */
  async delete(id: number): Promise<void> {
    await this.deleteById(id);
  }

  async list(query: NoteListQuery): Promise<{ notes: NoteWithAuthorCount[]; total: number }> {
    let authoredIds: number[] | undefined;
    if (query.authorId !== undefined) {
      authoredIds = await this.authors.listNoteIdsForUser(query.authorId);
      if (authoredIds.length === 0) {
        return { notes: [], total: 0 };
      }
    }

    let builder = this.supabase
      .from(this.tableName)
      .select('*, noteauthor(count)', { count: 'exact' })
      .is('deleted_at', null);

    if (query.privacy) {
      builder = builder.eq('privacy', query.privacy);
    }
    if (query.creatorId !== undefined) {
      builder = builder.eq('created_by_user_id', query.creatorId);
    }
    if (authoredIds) {
      builder = builder.in('id', authoredIds);
    }

    if (query.visibility.kind === 'public') {
      builder = builder.eq('privacy', 'public');
    } else if (query.visibility.kind === 'readable-by') {
      const readableIds = await this.authors.listNoteIdsForUser(query.visibility.userId);
      builder = readableIds.length > 0
        ? builder.or(`privacy.eq.public,id.in.(${readableIds.join(',')})`)
        : builder.eq('privacy', 'public');
    }

    const { data, count, error } = await builder
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .range(query.offset, query.offset + query.limit - 1);

    if (error) {
      this.fail(error, { query }, 'Error listing notes');
    }

    return {
      notes: (data as NoteListRow[]).map(row => ({
        note: this.mapToEntity(row),
        authorsCount: row.noteauthor[0]?.count ?? 0,
      })),
      total: count ?? 0,
    };
  }

  async countCreatedBy(userId: number): Promise<number> {
    const { count, error } = await this.supabase
      .from(this.tableName)
      .select('id', { count: 'exact', head: true })
      .eq('created_by_user_id', userId);

    if (error) {
      this.fail(error, { userId }, 'Error counting created notes');
    }

    return count ?? 0;
  }
}
