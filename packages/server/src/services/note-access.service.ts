import type { NoteAction } from '@notesnest/shared';
import type { Note, NoteAuthorStore, NoteStore, User } from '../repositories/types.js';
import { ForbiddenError, NotFoundError } from '../middleware/error-handler.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('NoteAccessService');

const ACTION_PHRASES: Record<NoteAction, string> = {
  view: 'view',
  edit: 'edit',
  delete: 'delete',
  manage_authors: 'manage authors of',
};

export class NoteAccessDeniedError extends ForbiddenError {
  constructor(action: string) {
    super(`You don't have permission to ${action} this note`);
    this.name = 'NoteAccessDeniedError';
  }
}

/**
 * Note access rules.
 *
 * - view: public notes for anyone, private notes for admins and authors
 * - edit, manage_authors: admins and authors
 * - delete: admins and the creator
 */
export class NoteAccessService {
  constructor(
    private notes: NoteStore,
    private noteAuthors: NoteAuthorStore
  ) {}

  async findNote(noteId: number, options: { includeDeleted?: boolean } = {}): Promise<Note> {
    const note = await this.notes.findById(noteId, options);
    if (!note) {
      throw new NotFoundError('Note', `Note with ID ${noteId} not found`);
    }
    return note;
  }

  async isAuthor(noteId: number, userId: number): Promise<boolean> {
    return (await this.noteAuthors.find(noteId, userId)) !== null;
  }

  async canView(note: Note, actor: User | null): Promise<boolean> {
    if (note.privacy === 'public') return true;
    if (!actor) return false;
    if (actor.role === 'admin') return true;
    return this.isAuthor(note.id, actor.id);
  }

  async canEdit(note: Note, actor: User): Promise<boolean> {
    return actor.role === 'admin' || this.isAuthor(note.id, actor.id);
  }

  canDelete(note: Note, actor: User): boolean {
    return actor.role === 'admin' || note.createdByUserId === actor.id;
  }

  async canManageAuthors(note: Note, actor: User): Promise<boolean> {
    return actor.role === 'admin' || this.isAuthor(note.id, actor.id);
  }

  /**
   * Resolve the note and check `action` for the actor; anonymous callers
   * may only view
   */
  async checkAccess(
    noteId: number,
    actor: User | null,
    action: NoteAction,
    options: { includeDeleted?: boolean } = {}
  ): Promise<Note> {
    const note = await this.findNote(noteId, options);

    let allowed: boolean;
    if (action === 'view') {
      allowed = await this.canView(note, actor);
    } else if (!actor) {
      allowed = false;
    } else if (action === 'edit') {
      allowed = await this.canEdit(note, actor);
    } else if (action === 'delete') {
      allowed = this.canDelete(note, actor);
    } else {
      allowed = await this.canManageAuthors(note, actor);
    }

    if (!allowed) {
      logger.debug({ noteId, actorId: actor?.id ?? null, action }, 'Note access denied');
      throw new NoteAccessDeniedError(ACTION_PHRASES[action]);
    }

    return note;
  }
}
