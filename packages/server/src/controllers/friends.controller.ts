import { Request, Response } from 'express';
import type { DetailResponse } from '@notesnest/shared';
import { FriendshipService } from '../services/friendship.service.js';
import { currentUser } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { parseInput } from '../middleware/validation.js';
import { idParamSchema } from '../validators/common.validator.js';
import { friendsListQuerySchema } from '../validators/friendship.validator.js';
import type { FriendRequestInput, RespondRequestInput } from '../validators/friendship.validator.js';

/**
 * Friends controller - friend requests and friend lists
 */
export class FriendsController {
  constructor(private friendshipService: FriendshipService) {}

  /**
   * POST /api/v1/friend-requests - Send a friend request
   */
  sendRequest = asyncHandler(async (req: Request, res: Response) => {
    const { addressee_id } = req.body as FriendRequestInput;
    const friendship = await this.friendshipService.sendRequest(currentUser(req).id, addressee_id);
    res.status(201).json(friendship);
  });

  /**
   * POST /api/v1/friend-requests/:id/respond - Accept, reject or block
   */
  respond = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { action } = req.body as RespondRequestInput;
    const friendship = await this.friendshipService.respond(id, action, currentUser(req).id);
    res.json(friendship);
  });

  /**
   * GET /api/v1/friend-requests/pending - Requests sent to the caller
   */
  pending = asyncHandler(async (req: Request, res: Response) => {
    res.json(await this.friendshipService.pendingRequests(currentUser(req).id));
  });

  /**
   * GET /api/v1/friend-requests/sent - Requests the caller sent
   */
  sent = asyncHandler(async (req: Request, res: Response) => {
    res.json(await this.friendshipService.sentRequests(currentUser(req).id));
  });

  /**
   * DELETE /api/v1/friend-requests/cancel/:id - Cancel a pending request to user :id
   */
  cancel = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    await this.friendshipService.cancelRequest(currentUser(req).id, id);
    const body: DetailResponse = { detail: 'Friend request cancelled successfully' };
    res.json(body);
  });

  /**
   * GET /api/v1/friends - Accepted friends, paginated
   */
  list = asyncHandler(async (req: Request, res: Response) => {
    const { page, per_page } = parseInput(friendsListQuerySchema, req.query);
    res.json(await this.friendshipService.listFriends(currentUser(req).id, page, per_page));
  });

  /**
   * DELETE /api/v1/friends/:id - Unfriend user :id
   */
  remove = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    await this.friendshipService.removeFriend(currentUser(req).id, id);
    const body: DetailResponse = { detail: 'Friend removed successfully' };
    res.json(body);
  });

  /**
   * GET /api/v1/friendship-status/:id - Relationship with user :id
   */
  status = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    res.json(await this.friendshipService.status(currentUser(req).id, id));
  });
}
