export const NOTE_PRIVACIES = ['private', 'public'] as const;

export type NotePrivacy = (typeof NOTE_PRIVACIES)[number];

/**
 * Action checked against a note's access rules
 */
export type NoteAction = 'view' | 'edit' | 'delete' | 'manage_authors';

export interface AuthorInfo {
  id: number;
  username: string;
  name: string;
  added_at: string;
  added_by_user_id: number | null;
}

/**
 * Full note, including its ordered author list
 */
export interface NoteRead {
  id: number;
  title: string;
  content: string;
  privacy: NotePrivacy;
  created_at: string;
  updated_at: string;
  created_by_user_id: number;
  authors: AuthorInfo[];
}

/**
 * Note row as shown in list views, without the full body
 */
export interface NoteListItem {
  id: number;
  title: string;
  privacy: NotePrivacy;
  created_at: string;
  updated_at: string;
  created_by_user_id: number;
  authors_count: number;
  content_preview: string;
}

export interface NotesListResponse {
  notes: NoteListItem[];
  total: number;
  page: number;
  per_page: number;
  has_next: boolean;
  has_prev: boolean;
}

export interface NoteAuthorRequest {
  user_id: number;
}

export interface TransferOwnershipRequest {
  new_creator_id: number;
}
