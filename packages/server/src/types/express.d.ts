import type { User } from '../repositories/types.js';

/**
 * Request augmentation: `user` is set by the auth gate once a bearer token resolves
 */
declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

export {};
