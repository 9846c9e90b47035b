import type { AuthorInfo, NoteRead } from '@notesnest/shared';
import type { NoteAuthorStore, NoteStore, User, UserStore } from '../repositories/types.js';
import { ConflictError, NotFoundError, ValidationError } from '../middleware/error-handler.js';
import { NoteAccessDeniedError, NoteAccessService } from './note-access.service.js';
import { toAuthorInfo, toNoteRead } from '../utils/serializers.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('NoteAuthorService');

function notAnAuthor(userId: number, noteId: number): NotFoundError {
  return new NotFoundError('Note author', `User ${userId} is not an author of note ${noteId}`);
}

/**
 * Note author service - co-author management and creator transfer
 */
export class NoteAuthorService {
  constructor(
    private notes: NoteStore,
    private noteAuthors: NoteAuthorStore,
    private users: UserStore,
    private access: NoteAccessService
  ) {}

  /**
   * Authors in the order they were added
   */
  async listAuthors(noteId: number, actor: User | null): Promise<AuthorInfo[]> {
    await this.access.checkAccess(noteId, actor, 'view');
    const authors = await this.noteAuthors.listForNote(noteId);
    return authors.map(toAuthorInfo);
  }

  async addAuthor(noteId: number, userId: number, actor: User): Promise<void> {
    await this.access.checkAccess(noteId, actor, 'manage_authors');

    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }

    if (await this.noteAuthors.find(noteId, userId)) {
      throw new ConflictError(`User ${userId} is already an author of note ${noteId}`);
    }

    await this.noteAuthors.add(noteId, userId, actor.id);
    logger.info({ noteId, userId, addedBy: actor.id }, 'Note author added');
  }

  /**
   * Remove an author; a note always keeps at least one
   */
  async removeAuthor(noteId: number, userId: number, actor: User): Promise<void> {
    await this.access.checkAccess(noteId, actor, 'manage_authors');

    const result = await this.noteAuthors.remove(noteId, userId);
    if (result === 'not_author') {
      throw notAnAuthor(userId, noteId);
    }
    if (result === 'last_author') {
      throw new ValidationError('Note validation error: Cannot remove the last author from a note');
    }

    logger.info({ noteId, userId, removedBy: actor.id }, 'Note author removed');
  }

  /**
   * Hand the creator role to another current author
   */
  async transferOwnership(noteId: number, newCreatorId: number, actor: User): Promise<NoteRead> {
    const note = await this.access.findNote(noteId);

    if (actor.role !== 'admin' && note.createdByUserId !== actor.id) {
      throw new NoteAccessDeniedError('transfer ownership of');
    }

    if (!(await this.access.isAuthor(noteId, newCreatorId))) {
      throw notAnAuthor(newCreatorId, noteId);
    }

    const updated = await this.notes.update(noteId, { createdByUserId: newCreatorId });
    logger.info({ noteId, from: note.createdByUserId, to: newCreatorId }, 'Note ownership transferred');

    return toNoteRead(updated, await this.noteAuthors.listForNote(noteId));
  }
}
