import { z } from 'zod';
import { NOTE_PRIVACIES, NOTE_TITLE_MAX_LENGTH } from '@notesnest/shared';
import { skipLimitQuerySchema } from './common.validator.js';

/**
 * Note validation schemas. Title and content are stored trimmed.
 */

const titleField = z
  .string()
  .trim()
  .min(1, 'Title cannot be empty')
  .max(NOTE_TITLE_MAX_LENGTH, `Title must be ${NOTE_TITLE_MAX_LENGTH} characters or less`);

const contentField = z.string().trim().min(1, 'Content cannot be empty');

const privacyField = z.enum(NOTE_PRIVACIES);

export const createNoteSchema = z.object({
  title: titleField,
  content: contentField,
  privacy: privacyField.default('private'),
});

export const updateNoteSchema = z.object({
  title: titleField.optional(),
  content: contentField.optional(),
  privacy: privacyField.optional(),
});

export const listNotesQuerySchema = skipLimitQuerySchema.extend({
  privacy: privacyField.optional(),
  creator_id: z.coerce.number().int().positive().optional(),
});

export const myNotesQuerySchema = skipLimitQuerySchema.extend({
  privacy: privacyField.optional(),
});

export const noteAuthorSchema = z.object({
  user_id: z.number().int().positive('User ID must be positive'),
});

export const transferOwnershipSchema = z.object({
  new_creator_id: z.number().int().positive('User ID must be positive'),
});

export type CreateNoteInput = z.infer<typeof createNoteSchema>;
export type UpdateNoteInput = z.infer<typeof updateNoteSchema>;
export type ListNotesQuery = z.infer<typeof listNotesQuerySchema>;
export type MyNotesQuery = z.infer<typeof myNotesQuerySchema>;
