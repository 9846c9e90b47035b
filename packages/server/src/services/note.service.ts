import type { NoteRead, NotesListResponse } from '@notesnest/shared';
import type {
  Note,
  NoteAuthorStore,
  NoteChanges,
  NoteListQuery,
  NoteStore,
  NoteVisibility,
  User,
} from '../repositories/types.js';
import type {
  CreateNoteInput,
  ListNotesQuery,
  MyNotesQuery,
  UpdateNoteInput,
} from '../validators/note.validator.js';
import { NoteAccessService } from './note-access.service.js';
import { toNoteListItem, toNoteRead } from '../utils/serializers.js';
import { offsetPageInfo } from '../utils/pagination.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('NoteService');

function visibilityFor(actor: User | null): NoteVisibility {
  if (!actor) return { kind: 'public' };
  if (actor.role === 'admin') return { kind: 'all' };
  return { kind: 'readable-by', userId: actor.id };
}

/**
 * Note service - note CRUD and listings
 */
export class NoteService {
  constructor(
    private notes: NoteStore,
    private noteAuthors: NoteAuthorStore,
    private access: NoteAccessService
  ) {}

  /**
   * Create a note with its creator as the first author
   */
  async create(input: CreateNoteInput, actor: User): Promise<NoteRead> {
    const note = await this.notes.createWithAuthor({
      title: input.title,
      content: input.content,
      privacy: input.privacy,
      createdByUserId: actor.id,
    });

    logger.info({ noteId: note.id, userId: actor.id }, 'Note created');
    return this.read(note);
  }

  async get(noteId: number, actor: User | null): Promise<NoteRead> {
    const note = await this.access.checkAccess(noteId, actor, 'view');
    return this.read(note);
  }

  /**
   * Listing restricted to what the caller may view: anonymous callers see
   * public notes, users also see private notes they author, admins see all
   */
  async list(query: ListNotesQuery, actor: User | null): Promise<NotesListResponse> {
    return this.page({
      visibility: visibilityFor(actor),
      privacy: query.privacy,
      creatorId: query.creator_id,
      offset: query.skip,
      limit: query.limit,
    });
  }

  /**
   * Notes the caller is an author of
   */
  async listMine(query: MyNotesQuery, actor: User): Promise<NotesListResponse> {
    return this.page({
      visibility: { kind: 'all' },
      privacy: query.privacy,
      authorId: actor.id,
      offset: query.skip,
      limit: query.limit,
    });
  }

  async update(noteId: number, input: UpdateNoteInput, actor: User): Promise<NoteRead> {
    await this.access.checkAccess(noteId, actor, 'edit');

    const changes: NoteChanges = {};
    if (input.title !== undefined) changes.title = input.title;
    if (input.content !== undefined) changes.content = input.content;
    if (input.privacy !== undefined) changes.privacy = input.privacy;

    const note = await this.notes.update(noteId, changes);
    logger.info({ noteId, userId: actor.id, fields: Object.keys(changes) }, 'Note updated');
    return this.read(note);
  }

  /**
   * Soft delete hides the note; permanent delete also reaches soft-deleted notes
   */
  async delete(noteId: number, actor: User, permanent = false): Promise<void> {
    await this.access.checkAccess(noteId, actor, 'delete', { includeDeleted: permanent });

    if (permanent) {
      await this.notes.delete(noteId);
    } else {
      await this.notes.softDelete(noteId);
    }
    logger.info({ noteId, userId: actor.id, permanent }, 'Note deleted');
  }

  async read(note: Note): Promise<NoteRead> {
    const authors = await this.noteAuthors.listForNote(note.id);
    return toNoteRead(note, authors);
  }

  private async page(query: NoteListQuery): Promise<NotesListResponse> {
    const { notes, total } = await this.notes.list(query);
    return {
      notes: notes.map(toNoteListItem),
      total,
      ...offsetPageInfo(query.offset, query.limit, total),
    };
  }
}
