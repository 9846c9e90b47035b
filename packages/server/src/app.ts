import express, { Express } from 'express';
import cors from 'cors';

import { config } from './config/index.js';
import { createApiRouter } from './routes/index.js';
import { createAuthGate } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createLogger } from './utils/logger.js';
import type { Stores } from './repositories/types.js';

// Services
import { AuthService } from './services/auth.service.js';
import { UserService } from './services/user.service.js';
import { FriendshipService } from './services/friendship.service.js';
import { NoteAccessService } from './services/note-access.service.js';
import { NoteService } from './services/note.service.js';
import { NoteAuthorService } from './services/note-author.service.js';

// Controllers
import { AuthController } from './controllers/auth.controller.js';
import { UsersController } from './controllers/users.controller.js';
import { FriendsController } from './controllers/friends.controller.js';
import { NotesController } from './controllers/notes.controller.js';

const logger = createLogger('App');

/**
 * Create and configure Express application over the given storage handle
 */
export function createApp(stores: Stores): Express {
  const app = express();

  // Basic middleware
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging (only in development)
  if (config.isDevelopment) {
    app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        logger.debug({
          method: req.method,
          url: req.url,
          status: res.statusCode,
          duration: `${duration}ms`,
        }, 'request');
      });
      next();
    });
  }

  // Services
  const noteAccessService = new NoteAccessService(stores.notes, stores.noteAuthors);
  const authService = new AuthService(stores.users);
  const userService = new UserService(stores.users, stores.notes, stores.noteAuthors);
  const friendshipService = new FriendshipService(stores.friendships, stores.users);
  const noteService = new NoteService(stores.notes, stores.noteAuthors, noteAccessService);
  const noteAuthorService = new NoteAuthorService(
    stores.notes,
    stores.noteAuthors,
    stores.users,
    noteAccessService
  );

  // Controllers
  const authController = new AuthController(authService);
  const usersController = new UsersController(userService);
  const friendsController = new FriendsController(friendshipService);
  const notesController = new NotesController(noteService, noteAuthorService);

  app.get('/', (_req, res) => {
    res.json({ name: 'notesnest', api: config.apiPrefix });
  });

  // API routes, behind the authentication gate
  app.use(config.apiPrefix, createAuthGate(stores.users));
  app.use(config.apiPrefix, createApiRouter({
    authController,
    usersController,
    friendsController,
    notesController,
  }));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
