import { Request, Response } from 'express';
import type { DetailResponse, NoteAuthorRequest, TransferOwnershipRequest } from '@notesnest/shared';
import { NoteService } from '../services/note.service.js';
import { NoteAuthorService } from '../services/note-author.service.js';
import { currentUser } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { parseInput } from '../middleware/validation.js';
import { deleteQuerySchema, idParamSchema } from '../validators/common.validator.js';
import { listNotesQuerySchema, myNotesQuerySchema } from '../validators/note.validator.js';
import type { CreateNoteInput, UpdateNoteInput } from '../validators/note.validator.js';

/**
 * Notes controller - notes and their authors
 */
export class NotesController {
  constructor(
    private noteService: NoteService,
    private noteAuthorService: NoteAuthorService
  ) {}

  /**
   * POST /api/v1/notes - Create a note
   */
  create = asyncHandler(async (req: Request, res: Response) => {
    const note = await this.noteService.create(req.body as CreateNoteInput, currentUser(req));
    res.status(201).json(note);
  });

  /**
   * GET /api/v1/notes - Notes visible to the caller (anonymous allowed)
   */
  list = asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(listNotesQuerySchema, req.query);
    res.json(await this.noteService.list(query, req.user ?? null));
  });

  /**
   * GET /api/v1/notes/my - Notes the caller authors
   */
  listMine = asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(myNotesQuerySchema, req.query);
    res.json(await this.noteService.listMine(query, currentUser(req)));
  });

  /**
   * GET /api/v1/notes/:id - Full note (anonymous allowed for public notes)
   */
  getById = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    res.json(await this.noteService.get(id, req.user ?? null));
  });

  /**
   * PUT /api/v1/notes/:id - Update title, content or privacy
   */
  update = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    res.json(await this.noteService.update(id, req.body as UpdateNoteInput, currentUser(req)));
  });

  /**
   * DELETE /api/v1/notes/:id?permanent=true
   */
  delete = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { permanent } = parseInput(deleteQuerySchema, req.query);
    await this.noteService.delete(id, currentUser(req), permanent);
    const body: DetailResponse = { detail: 'Note deleted successfully' };
    res.json(body);
  });

  /**
   * GET /api/v1/notes/:id/authors
   */
  listAuthors = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    res.json(await this.noteAuthorService.listAuthors(id, req.user ?? null));
  });

  /**
   * POST /api/v1/notes/:id/authors - Add a co-author
   */
  addAuthor = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { user_id } = req.body as NoteAuthorRequest;
    await this.noteAuthorService.addAuthor(id, user_id, currentUser(req));
    const body: DetailResponse = { detail: 'Author added successfully' };
    res.status(201).json(body);
  });

  /**
   * DELETE /api/v1/notes/:id/authors - Remove a co-author (body `{user_id}`)
   */
  removeAuthor = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { user_id } = req.body as NoteAuthorRequest;
    await this.noteAuthorService.removeAuthor(id, user_id, currentUser(req));
    const body: DetailResponse = { detail: 'Author removed successfully' };
    res.json(body);
  });

  /**
   * POST /api/v1/notes/:id/transfer - Hand the creator role to another author
   */
  transfer = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { new_creator_id } = req.body as TransferOwnershipRequest;
    res.json(await this.noteAuthorService.transferOwnership(id, new_creator_id, currentUser(req)));
  });
}
