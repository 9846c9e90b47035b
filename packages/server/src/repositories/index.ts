import { SupabaseClient } from '@supabase/supabase-js';
import { UserRepository } from './user.repository.js';
import { FriendshipRepository } from './friendship.repository.js';
import { NoteRepository } from './note.repository.js';
import { NoteAuthorRepository } from './note-author.repository.js';
import type { Stores } from './types.js';

/**
 * Build the Supabase-backed storage handle
 */
export function createSupabaseStores(supabase: SupabaseClient): Stores {
  return {
    users: new UserRepository(supabase),
    friendships: new FriendshipRepository(supabase),
    notes: new NoteRepository(supabase),
    noteAuthors: new NoteAuthorRepository(supabase),
  };
}

export type * from './types.js';
