import type {
  AuthorInfo,
  FriendRead,
  FriendshipRead,
  NoteListItem,
  NoteRead,
  UserRead,
} from '@notesnest/shared';
import { buildContentPreview } from '@notesnest/shared';
import type {
  Friendship,
  FriendshipWithUser,
  Note,
  NoteAuthorWithUser,
  NoteWithAuthorCount,
  User,
} from '../repositories/types.js';

// Entities to the snake_case wire shapes

export function toUserRead(user: User): UserRead {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    name: user.name,
    age: user.age,
    bio: user.bio,
    is_active: user.isActive,
    is_email_verified: user.isEmailVerified,
    role: user.role,
    social_links: { ...user.socialLinks },
    address: { ...user.address },
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

export function toFriendshipRead(friendship: Friendship): FriendshipRead {
  return {
    id: friendship.id,
    requester_id: friendship.requesterId,
    addressee_id: friendship.addresseeId,
    status: friendship.status,
    created_at: friendship.createdAt.toISOString(),
    updated_at: friendship.updatedAt.toISOString(),
  };
}

export function toFriendRead({ friendship, friend }: FriendshipWithUser): FriendRead {
  return {
    id: friend.id,
    username: friend.username,
    name: friend.name,
    email: friend.email,
    is_active: friend.isActive,
    friendship_status: friendship.status,
    friendship_since: friendship.createdAt.toISOString(),
  };
}

export function toAuthorInfo(author: NoteAuthorWithUser): AuthorInfo {
  return {
    id: author.user.id,
    username: author.user.username,
    name: author.user.name,
    added_at: author.addedAt.toISOString(),
    added_by_user_id: author.addedByUserId,
  };
}

export function toNoteRead(note: Note, authors: NoteAuthorWithUser[]): NoteRead {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    privacy: note.privacy,
    created_at: note.createdAt.toISOString(),
    updated_at: note.updatedAt.toISOString(),
    created_by_user_id: note.createdByUserId,
    authors: authors.map(toAuthorInfo),
  };
}

export function toNoteListItem({ note, authorsCount }: NoteWithAuthorCount): NoteListItem {
  return {
    id: note.id,
    title: note.title,
    privacy: note.privacy,
    created_at: note.createdAt.toISOString(),
    updated_at: note.updatedAt.toISOString(),
    created_by_user_id: note.createdByUserId,
    authors_count: authorsCount,
    content_preview: buildContentPreview(note.content),
  };
}
