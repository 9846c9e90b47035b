import { Router } from 'express';
import { AuthController } from '../controllers/auth.controller.js';
import { validate } from '../middleware/validation.js';
import { loginSchema, refreshTokenSchema } from '../validators/auth.validator.js';

/**
 * Create token router (public)
 */
export function createAuthRouter(controller: AuthController): Router {
  const router = Router();

  // POST /api/v1/token - Login (form-encoded or JSON)
  router.post('/', validate(loginSchema), controller.login);

  // POST /api/v1/token/refresh - Refresh token pair
  router.post('/refresh', validate(refreshTokenSchema), controller.refresh);

  return router;
}
