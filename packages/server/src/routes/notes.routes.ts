import { Router } from 'express';
import { NotesController } from '../controllers/notes.controller.js';
import { requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validation.js';
import { idParamSchema } from '../validators/common.validator.js';
import {
  createNoteSchema,
  noteAuthorSchema,
  transferOwnershipSchema,
  updateNoteSchema,
} from '../validators/note.validator.js';

/**
 * Create notes router. Reads are open to anonymous callers; the
 * service decides what they may see.
 */
export function createNotesRouter(controller: NotesController): Router {
  const router = Router();

  // GET /api/v1/notes - List notes
  router.get('/', controller.list);

  // GET /api/v1/notes/my - Caller's notes (before /:id)
  router.get('/my', requireAuth, controller.listMine);

  // POST /api/v1/notes - Create note
  router.post('/', requireAuth, validate(createNoteSchema), controller.create);

  // GET /api/v1/notes/:id - Get note
  router.get('/:id', validate(idParamSchema, 'params'), controller.getById);

  // PUT /api/v1/notes/:id - Update note
  router.put('/:id', requireAuth, validate(idParamSchema, 'params'), validate(updateNoteSchema), controller.update);

  // DELETE /api/v1/notes/:id - Delete note
  router.delete('/:id', requireAuth, validate(idParamSchema, 'params'), controller.delete);

  // GET /api/v1/notes/:id/authors - List authors
  router.get('/:id/authors', validate(idParamSchema, 'params'), controller.listAuthors);

  // POST /api/v1/notes/:id/authors - Add author
  router.post('/:id/authors', requireAuth, validate(idParamSchema, 'params'), validate(noteAuthorSchema), controller.addAuthor);

  // DELETE /api/v1/notes/:id/authors - Remove author
  router.delete('/:id/authors', requireAuth, validate(idParamSchema, 'params'), validate(noteAuthorSchema), controller.removeAuthor);

  // POST /api/v1/notes/:id/transfer - Transfer ownership
  router.post('/:id/transfer', requireAuth, validate(idParamSchema, 'params'), validate(transferOwnershipSchema), controller.transfer);

  return router;
}
