import { Router } from 'express';
import { createAuthRouter } from './auth.routes.js';
import { createUsersRouter } from './users.routes.js';
import { createFriendsRouter } from './friends.routes.js';
import { createNotesRouter } from './notes.routes.js';
import { AuthController } from '../controllers/auth.controller.js';
import { UsersController } from '../controllers/users.controller.js';
import { FriendsController } from '../controllers/friends.controller.js';
import { NotesController } from '../controllers/notes.controller.js';

export interface RouterDependencies {
  authController: AuthController;
  usersController: UsersController;
  friendsController: FriendsController;
  notesController: NotesController;
}

/**
 * Create all API routes
 */
export function createApiRouter(deps: RouterDependencies): Router {
  const router = Router();

  // Mount route modules
  router.use('/token', createAuthRouter(deps.authController));
  router.use('/users', createUsersRouter(deps.usersController));
  router.use('/notes', createNotesRouter(deps.notesController));
  router.use('/', createFriendsRouter(deps.friendsController));

  // Health check
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return router;
}
