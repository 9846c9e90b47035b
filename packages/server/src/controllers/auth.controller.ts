import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service.js';
import { asyncHandler } from '../middleware/error-handler.js';
import type { LoginInput, RefreshTokenInput } from '../validators/auth.validator.js';

/**
 * Auth controller - token endpoints
 */
export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /api/v1/token - Log in with e-mail (as `username`) and password
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = req.body as LoginInput;
    const tokens = await this.authService.login(username, password);
    res.json(tokens);
  });

  /**
   * POST /api/v1/token/refresh - Exchange a refresh token for a new pair
   */
  refresh = asyncHandler(async (req: Request, res: Response) => {
    const { refresh_token } = req.body as RefreshTokenInput;
    const tokens = await this.authService.refresh(refresh_token);
    res.json(tokens);
  });
}
