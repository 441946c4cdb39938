// file: src/modules/auth/auth.controller.ts

import type { Request, Response } from "express";

import { COOKIE_CONFIG } from "@/config/cookie.config";
import { MESSAGES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { asyncHandler } from "@/middlewares/async-handler.middleware";
import { currentUser } from "@/middlewares/auth.middleware";
import { UnauthorizedException } from "@/utils/app-error.utils";
import { ApiResponse } from "@/utils/response.utils";
import { zParse } from "@/utils/validators.utils";

import {
  changePasswordSchema,
  forgotPasswordSchema,
  loginSchema,
  registerSchema,
  resendVerificationCodeSchema,
  resetPasswordSchema,
  verifyEmailSchema,
} from "./auth.schema";
import { AuthService } from "./auth.service";
import type { AuthControllerResponse } from "./auth.type";

const readRefreshCookie = (req: Request): string | undefined => {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const value = cookies[COOKIE_CONFIG.REFRESH_TOKEN.name];
  return typeof value === "string" && value.length > 0 ? value : undefined;
};

export class AuthController {
  private authService: AuthService;

  constructor() {
    this.authService = new AuthService();
  }

  /**
   * POST /auth/register
   */
  register = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(registerSchema, req);
    const result = await this.authService.register(validated.body);

    ApiResponse.created(
      res,
      result,
      result.verificationRequired
        ? MESSAGES.AUTH.REGISTER_VERIFY_EMAIL
        : MESSAGES.AUTH.REGISTER_SUCCESS
    );
  });

  /**
   * POST /auth/login
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(loginSchema, req);
    const result = await this.authService.login(validated.body);

    res.cookie(
      COOKIE_CONFIG.REFRESH_TOKEN.name,
      result.tokens.refreshToken,
      COOKIE_CONFIG.REFRESH_TOKEN.options
    );

    const response: AuthControllerResponse = {
      user: result.user,
      accessToken: result.tokens.accessToken,
      expiresIn: result.tokens.expiresIn,
    };

    ApiResponse.success(res, response, MESSAGES.AUTH.LOGIN_SUCCESS);
  });

  verifyEmail = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(verifyEmailSchema, req);
    const result = await this.authService.verifyEmail(validated.body);

    ApiResponse.success(res, result, MESSAGES.AUTH.EMAIL_VERIFIED_SUCCESS);
  });

  resendVerificationCode = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(resendVerificationCodeSchema, req);
    const result = await this.authService.resendVerificationCode(
      validated.body.email
    );

    ApiResponse.success(res, result, MESSAGES.AUTH.VERIFICATION_CODE_SENT);
  });

  /**
   * POST /auth/forgot-password
   */
  forgotPassword = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(forgotPasswordSchema, req);
    const result = await this.authService.requestPasswordReset(
      validated.body.email
    );

    ApiResponse.success(res, result, MESSAGES.AUTH.PASSWORD_RESET_REQUESTED);
  });

  /**
   * POST /auth/reset-password
   */
  resetPassword = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(resetPasswordSchema, req);
    const result = await this.authService.resetPassword(validated.body);

    ApiResponse.success(res, result, MESSAGES.AUTH.PASSWORD_RESET_SUCCESS);
  });

  /**
   * POST /auth/refresh-token, reads the httpOnly cookie set at login
   */
  refreshToken = asyncHandler(async (req: Request, res: Response) => {
    const refreshToken = readRefreshCookie(req);
    if (!refreshToken) {
      throw new UnauthorizedException(
        "Refresh token not found",
        ErrorCodeEnum.AUTH_TOKEN_NOT_FOUND
      );
    }

    const result = await this.authService.refreshAccessToken(refreshToken);
    ApiResponse.success(res, result);
  });

  logout = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    await this.authService.logout(userId, readRefreshCookie(req));

    res.clearCookie(COOKIE_CONFIG.REFRESH_TOKEN.name, {
      httpOnly: true,
      secure: COOKIE_CONFIG.REFRESH_TOKEN.options.secure,
      sameSite: COOKIE_CONFIG.REFRESH_TOKEN.options.sameSite,
      path: COOKIE_CONFIG.REFRESH_TOKEN.options.path,
    });

    ApiResponse.success(res, null, MESSAGES.AUTH.LOGOUT_SUCCESS);
  });

  /**
   * PUT /auth/change-password, every role
   */
  changePassword = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    const validated = await zParse(changePasswordSchema, req);

    const result = await this.authService.changePassword(
      userId,
      validated.body,
      readRefreshCookie(req)
    );

    res.clearCookie(COOKIE_CONFIG.REFRESH_TOKEN.name, {
      path: COOKIE_CONFIG.REFRESH_TOKEN.options.path,
    });
    ApiResponse.success(res, result, MESSAGES.AUTH.PASSWORD_CHANGED);
  });
}
