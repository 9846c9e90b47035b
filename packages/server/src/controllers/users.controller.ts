import { Request, Response } from 'express';
import type { DetailResponse } from '@notesnest/shared';
import { UserService } from '../services/user.service.js';
import { currentUser } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { parseInput } from '../middleware/validation.js';
import { deleteQuerySchema, idParamSchema, skipLimitQuerySchema } from '../validators/common.validator.js';
import { verifyEmailParamsSchema } from '../validators/user.validator.js';
import type { CreateUserInput, RoleUpdateInput, UpdateUserInput } from '../validators/user.validator.js';

/**
 * Users controller - account endpoints
 */
export class UsersController {
  constructor(private userService: UserService) {}

  /**
   * POST /api/v1/users - Register
   */
  create = asyncHandler(async (req: Request, res: Response) => {
    const user = await this.userService.create(req.body as CreateUserInput);
    res.status(201).json(user);
  });

  /**
   * GET /api/v1/users - List active accounts
   */
  list = asyncHandler(async (req: Request, res: Response) => {
    const { skip, limit } = parseInput(skipLimitQuerySchema, req.query);
    const users = await this.userService.list(skip, limit);
    res.json(users);
  });

  /**
   * GET /api/v1/users/:id - Own profile, or any profile for admins
   */
  getById = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const user = await this.userService.get(id, currentUser(req));
    res.json(user);
  });

  /**
   * PUT /api/v1/users/:id - Update profile fields
   */
  update = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const user = await this.userService.update(id, req.body as UpdateUserInput, currentUser(req));
    res.json(user);
  });

  /**
   * DELETE /api/v1/users/:id?permanent=true - Soft or permanent delete (admin)
   */
  delete = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { permanent } = parseInput(deleteQuerySchema, req.query);
    await this.userService.delete(id, currentUser(req), permanent);
    const body: DetailResponse = { detail: 'User deleted successfully' };
    res.json(body);
  });

  /**
   * POST /api/v1/users/:id/role - Change role (admin)
   */
  changeRole = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { role } = req.body as RoleUpdateInput;
    const user = await this.userService.changeRole(id, role, currentUser(req));
    res.json(user);
  });

  /**
   * POST /api/v1/users/verify-email/:token
   */
  verifyEmail = asyncHandler(async (req: Request, res: Response) => {
    const { token } = parseInput(verifyEmailParamsSchema, req.params);
    await this.userService.verifyEmail(token);
    const body: DetailResponse = { detail: 'Email verified successfully' };
    res.json(body);
  });
}
