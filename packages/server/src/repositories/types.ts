import type {
  Address,
  FriendshipStatus,
  NotePrivacy,
  SocialLinks,
  UserRole,
} from '@notesnest/shared';

/**
 * Persisted user account
 */
export interface User {
  id: number;
  username: string;
  email: string;
  name: string;
  age: number | null;
  bio: string | null;
  hashedPassword: string;
  role: UserRole;
  isActive: boolean;
  isEmailVerified: boolean;
  emailVerificationToken: string | null;
  socialLinks: SocialLinks;
  address: Address;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface NewUser {
  username: string;
  email: string;
  name: string;
  age: number | null;
  bio: string | null;
  hashedPassword: string;
  emailVerificationToken: string;
}

export type UserChanges = Partial<
  Pick<
    User,
    | 'username'
    | 'email'
    | 'name'
    | 'age'
    | 'bio'
    | 'role'
    | 'isActive'
    | 'isEmailVerified'
    | 'emailVerificationToken'
    | 'socialLinks'
    | 'address'
    | 'deletedAt'
  >
>;

export interface Friendship {
  id: number;
  requesterId: number;
  addresseeId: number;
  status: FriendshipStatus;
  createdAt: Date;
  updatedAt: Date;
}

export type FriendshipChanges = Partial<Pick<Friendship, 'status'>>;

/**
 * Accepted friendship joined to the other side's account
 */
export interface FriendshipWithUser {
  friendship: Friendship;
  friend: User;
}

export interface Note {
  id: number;
  title: string;
  content: string;
  privacy: NotePrivacy;
  createdByUserId: number;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface NewNote {
  title: string;
  content: string;
  privacy: NotePrivacy;
  createdByUserId: number;
}

export type NoteChanges = Partial<Pick<Note, 'title' | 'content' | 'privacy' | 'createdByUserId'>>;

export interface NoteWithAuthorCount {
  note: Note;
  authorsCount: number;
}

/**
 * Which notes a listing may return
 */
export type NoteVisibility =
  | { kind: 'all' }
  | { kind: 'public' }
  | { kind: 'readable-by'; userId: number };

export interface NoteListQuery {
  visibility: NoteVisibility;
  privacy?: NotePrivacy;
  creatorId?: number;
  authorId?: number;
  offset: number;
  limit: number;
}

export interface NoteAuthor {
  noteId: number;
  userId: number;
  addedAt: Date;
  addedByUserId: number | null;
}

export interface NoteAuthorWithUser extends NoteAuthor {
  user: Pick<User, 'id' | 'username' | 'name'>;
}

export type RemoveAuthorResult = 'removed' | 'not_author' | 'last_author';

export interface UserStore {
  findById(id: number, options?: { includeDeleted?: boolean }): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByVerificationToken(token: string): Promise<User | null>;
  existsWithEmail(email: string, excludeUserId?: number): Promise<boolean>;
  existsWithUsername(username: string, excludeUserId?: number): Promise<boolean>;
  list(offset: number, limit: number): Promise<User[]>;
  create(data: NewUser): Promise<User>;
  update(id: number, changes: UserChanges): Promise<User>;
  delete(id: number): Promise<void>;
}

export interface FriendshipStore {
  findById(id: number): Promise<Friendship | null>;
  /** Relationship between two users in either direction */
  findBetween(userA: number, userB: number): Promise<Friendship | null>;
  findPending(requesterId: number, addresseeId: number): Promise<Friendship | null>;
  create(requesterId: number, addresseeId: number): Promise<Friendship>;
  /** Delete a rejected row and insert a fresh pending one for the pair, atomically */
  replaceRejected(rejectedId: number, requesterId: number, addresseeId: number): Promise<Friendship>;
  update(id: number, changes: FriendshipChanges): Promise<Friendship>;
  delete(id: number): Promise<void>;
  listAccepted(userId: number, offset: number, limit: number): Promise<FriendshipWithUser[]>;
  countAccepted(userId: number): Promise<number>;
  listPending(userId: number, side: 'requester' | 'addressee'): Promise<Friendship[]>;
}

export interface NoteStore {
  findById(id: number, options?: { includeDeleted?: boolean }): Promise<Note | null>;
  /** Insert the note and its creator as first author atomically */
  createWithAuthor(data: NewNote): Promise<Note>;
  update(id: number, changes: NoteChanges): Promise<Note>;
  softDelete(id: number): Promise<void>;
  delete(id: number): Promise<void>;
  list(query: NoteListQuery): Promise<{ notes: NoteWithAuthorCount[]; total: number }>;
  countCreatedBy(userId: number): Promise<number>;
}

export interface NoteAuthorStore {
  find(noteId: number, userId: number): Promise<NoteAuthor | null>;
  /** Authors ordered by the time they were added */
  listForNote(noteId: number): Promise<NoteAuthorWithUser[]>;
  countForNote(noteId: number): Promise<number>;
  add(noteId: number, userId: number, addedByUserId: number): Promise<NoteAuthor>;
  /** Delete the association unless it is the note's last one */
  remove(noteId: number, userId: number): Promise<RemoveAuthorResult>;
  listNoteIdsForUser(userId: number): Promise<number[]>;
}

/**
 * Storage handle passed to the application
 */
export interface Stores {
  users: UserStore;
  friendships: FriendshipStore;
  notes: NoteStore;
  noteAuthors: NoteAuthorStore;
}
