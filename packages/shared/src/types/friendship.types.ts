/**
 * Relationship status between two users
 */
export type FriendshipStatus = 'pending' | 'accepted' | 'blocked' | 'rejected';

/**
 * Response to a pending request, sent by the addressee
 */
export type FriendRequestAction = 'accept' | 'reject' | 'block';

export const FRIEND_REQUEST_ACTIONS: readonly FriendRequestAction[] = ['accept', 'reject', 'block'];

export interface FriendshipRead {
  id: number;
  requester_id: number;
  addressee_id: number;
  status: FriendshipStatus;
  created_at: string;
  updated_at: string;
}

/**
 * A friend with the public fields of their profile
 */
export interface FriendRead {
  id: number;
  username: string;
  name: string;
  email: string;
  is_active: boolean;
  friendship_status: FriendshipStatus;
  friendship_since: string;
}

export interface FriendsList {
  friends: FriendRead[];
  total: number;
  page: number;
  per_page: number;
  has_next: boolean;
  has_prev: boolean;
}

export interface FriendshipStatusResponse {
  user_id: number;
  friendship_status: FriendshipStatus | 'none';
  are_friends: boolean;
}
