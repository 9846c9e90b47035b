import type {
  FriendRequestAction,
  FriendsList,
  FriendshipRead,
  FriendshipStatus,
  FriendshipStatusResponse,
} from '@notesnest/shared';
import { FRIEND_REQUEST_ACTIONS } from '@notesnest/shared';
import type { FriendshipStore, UserStore } from '../repositories/types.js';
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../middleware/error-handler.js';
import { toFriendRead, toFriendshipRead } from '../utils/serializers.js';
import { numberedPageInfo } from '../utils/pagination.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('FriendshipService');

const ACTION_STATUS: Record<FriendRequestAction, FriendshipStatus> = {
  accept: 'accepted',
  reject: 'rejected',
  block: 'blocked',
};

function parseAction(action: string): FriendRequestAction {
  const normalized = action.trim().toLowerCase();
  const match = FRIEND_REQUEST_ACTIONS.find(candidate => candidate === normalized);
  if (!match) {
    throw new ValidationError("Invalid action. Must be 'accept', 'reject', or 'block'");
  }
  return match;
}

/**
 * Friendship service - one relationship row per user pair.
 *
 * pending -> accepted | rejected | blocked. Accepted rows are removed by
 * either side, pending rows cancelled by their requester. A new request
 * between a rejected pair replaces the rejected row with a fresh one.
 */
export class FriendshipService {
  constructor(
    private friendships: FriendshipStore,
    private users: UserStore
  ) {}

  async sendRequest(requesterId: number, addresseeId: number): Promise<FriendshipRead> {
    if (requesterId === addresseeId) {
      throw new BadRequestError('Cannot send friend request to yourself');
    }

    const [requester, addressee] = await Promise.all([
      this.users.findById(requesterId),
      this.users.findById(addresseeId),
    ]);
    if (!requester || !addressee) {
      throw new NotFoundError('User');
    }

    const existing = await this.friendships.findBetween(requesterId, addresseeId);
    if (existing) {
      switch (existing.status) {
        case 'pending':
          throw new BadRequestError('Friend request already pending');
        case 'accepted':
          throw new BadRequestError('Users are already friends');
        case 'blocked':
          throw new BadRequestError('Cannot send friend request to blocked user');
        case 'rejected': {
          const renewed = await this.friendships.replaceRejected(existing.id, requesterId, addresseeId);
          logger.info(
            { friendshipId: renewed.id, rejectedId: existing.id, requesterId, addresseeId },
            'Friend request sent after rejection'
          );
          return toFriendshipRead(renewed);
        }
      }
    }

    const friendship = await this.friendships.create(requesterId, addresseeId);
    logger.info({ friendshipId: friendship.id, requesterId, addresseeId }, 'Friend request sent');
    return toFriendshipRead(friendship);
  }

  /**
   * Addressee's answer to a pending request
   */
  async respond(friendshipId: number, action: string, actorId: number): Promise<FriendshipRead> {
    const friendship = await this.friendships.findById(friendshipId);
    if (!friendship) {
      throw new NotFoundError('Friend request');
    }

    if (friendship.addresseeId !== actorId) {
      throw new ForbiddenError('You can only respond to friend requests sent to you');
    }

    if (friendship.status !== 'pending') {
      throw new BadRequestError('Can only respond to pending friend requests');
    }

    const status = ACTION_STATUS[parseAction(action)];
    const updated = await this.friendships.update(friendshipId, { status });
    logger.info({ friendshipId, status, actorId }, 'Friend request answered');
    return toFriendshipRead(updated);
  }

  async removeFriend(userId: number, friendId: number): Promise<void> {
    const friendship = await this.friendships.findBetween(userId, friendId);
    if (!friendship) {
      throw new NotFoundError('Friendship');
    }

    if (friendship.status !== 'accepted') {
      throw new BadRequestError('Users are not friends');
    }

    await this.friendships.delete(friendship.id);
    logger.info({ userId, friendId }, 'Friend removed');
  }

  /**
   * Withdraw a request the caller sent that is still pending
   */
  async cancelRequest(requesterId: number, addresseeId: number): Promise<void> {
    const friendship = await this.friendships.findPending(requesterId, addresseeId);
    if (!friendship) {
      throw new NotFoundError('Friend request', 'No pending friend request found');
    }

    await this.friendships.delete(friendship.id);
    logger.info({ requesterId, addresseeId }, 'Friend request cancelled');
  }

  async listFriends(userId: number, page: number, perPage: number): Promise<FriendsList> {
    const [friends, total] = await Promise.all([
      this.friendships.listAccepted(userId, (page - 1) * perPage, perPage),
      this.friendships.countAccepted(userId),
    ]);

    return {
      friends: friends.map(toFriendRead),
      total,
      ...numberedPageInfo(page, perPage, total),
    };
  }

  async pendingRequests(userId: number): Promise<FriendshipRead[]> {
    const requests = await this.friendships.listPending(userId, 'addressee');
    return requests.map(toFriendshipRead);
  }

  async sentRequests(userId: number): Promise<FriendshipRead[]> {
    const requests = await this.friendships.listPending(userId, 'requester');
    return requests.map(toFriendshipRead);
  }

  async status(userId: number, otherUserId: number): Promise<FriendshipStatusResponse> {
    const friendship = await this.friendships.findBetween(userId, otherUserId);
    const status = friendship ? friendship.status : 'none';

    return {
      user_id: otherUserId,
      friendship_status: status,
      are_friends: status === 'accepted',
    };
  }
}
