import { Router } from 'express';
import { UsersController } from '../controllers/users.controller.js';
import { requireAdmin, requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validation.js';
import { idParamSchema } from '../validators/common.validator.js';
import {
  createUserSchema,
  roleUpdateSchema,
  updateUserSchema,
  verifyEmailParamsSchema,
} from '../validators/user.validator.js';

/**
 * Create users router
 */
export function createUsersRouter(controller: UsersController): Router {
  const router = Router();

  // POST /api/v1/users - Register (public)
  router.post('/', validate(createUserSchema), controller.create);

  // POST /api/v1/users/verify-email/:token - Verify e-mail (public)
  router.post('/verify-email/:token', validate(verifyEmailParamsSchema, 'params'), controller.verifyEmail);

  // GET /api/v1/users - List users
  router.get('/', requireAuth, controller.list);

  // GET /api/v1/users/:id - Get user
  router.get('/:id', requireAuth, validate(idParamSchema, 'params'), controller.getById);

  // PUT /api/v1/users/:id - Update user
  router.put('/:id', requireAuth, validate(idParamSchema, 'params'), validate(updateUserSchema), controller.update);

  // DELETE /api/v1/users/:id - Delete user (admin)
  router.delete('/:id', requireAdmin, validate(idParamSchema, 'params'), controller.delete);

  // POST /api/v1/users/:id/role - Change role (admin)
  router.post('/:id/role', requireAdmin, validate(idParamSchema, 'params'), validate(roleUpdateSchema), controller.changeRole);

  return router;
}
