import { Router } from 'express';
import { FriendsController } from '../controllers/friends.controller.js';
import { requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validation.js';
import { idParamSchema } from '../validators/common.validator.js';
import { friendRequestSchema, respondRequestSchema } from '../validators/friendship.validator.js';

/**
 * Create friends router. Paths span several top-level segments, so it is
 * mounted at the API root.
 */
export function createFriendsRouter(controller: FriendsController): Router {
  const router = Router();

  // POST /api/v1/friend-requests - Send request
  router.post('/friend-requests', requireAuth, validate(friendRequestSchema), controller.sendRequest);

  // GET /api/v1/friend-requests/pending - Incoming requests
  router.get('/friend-requests/pending', requireAuth, controller.pending);

  // GET /api/v1/friend-requests/sent - Outgoing requests
  router.get('/friend-requests/sent', requireAuth, controller.sent);

  // POST /api/v1/friend-requests/:id/respond - Answer a request
  router.post(
    '/friend-requests/:id/respond',
    requireAuth,
    validate(idParamSchema, 'params'),
    validate(respondRequestSchema),
    controller.respond
  );

  // DELETE /api/v1/friend-requests/cancel/:id - Cancel request to user :id
  router.delete('/friend-requests/cancel/:id', requireAuth, validate(idParamSchema, 'params'), controller.cancel);

  // GET /api/v1/friends - Friends list
  router.get('/friends', requireAuth, controller.list);

  // DELETE /api/v1/friends/:id - Remove friend
  router.delete('/friends/:id', requireAuth, validate(idParamSchema, 'params'), controller.remove);

  // GET /api/v1/friendship-status/:id - Relationship status
  router.get('/friendship-status/:id', requireAuth, validate(idParamSchema, 'params'), controller.status);

  return router;
}
