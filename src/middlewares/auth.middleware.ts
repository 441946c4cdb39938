// file: src/middlewares/auth.middleware.ts

import type { NextFunction, Request, Response } from "express";

import { ACCOUNT_STATUS, MESSAGES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { logger } from "@/middlewares/pino-logger";
import { AuthUtil } from "@/modules/auth/auth.utils";
import type { UserRole } from "@/modules/user/user.interface";
import type { JWTPayload } from "@/modules/user/user.type";
import {
  ForbiddenException,
  UnauthorizedException,
} from "@/utils/app-error.utils";

declare global {
  namespace Express {
    interface Request {
      user?: JWTPayload;
    }
  }
}

function bearerToken(req: Request): string | null {
  const authHeader = req.get("Authorization");
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.substring(7) || null;
}

export class AuthMiddleware {
  static verifyToken = (req: Request, _res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req);

      if (!token) {
        logger.warn(
          { requestId: req.id, path: req.path },
          "Missing or invalid Authorization header"
        );
        throw new UnauthorizedException(
          MESSAGES.AUTH.UNAUTHORIZED_ACCESS,
          ErrorCodeEnum.AUTH_TOKEN_NOT_FOUND
        );
      }

      const payload = AuthUtil.verifyAccessToken(token);

      if (payload.accountStatus === ACCOUNT_STATUS.SUSPENDED) {
        throw new ForbiddenException(
          MESSAGES.AUTH.ACCOUNT_SUSPENDED,
          ErrorCodeEnum.ACCESS_UNAUTHORIZED
        );
      }

      req.user = payload;
      next();
    } catch (error) {
      logger.warn(
        {
          requestId: req.id,
          error: error instanceof Error ? error.message : String(error),
        },
        "Token verification failed"
      );
      next(error);
    }
  };

  static authorize = (...allowedRoles: UserRole[]) => {
    return (req: Request, _res: Response, next: NextFunction) => {
      if (!req.user) {
        next(
          new UnauthorizedException(
            MESSAGES.AUTH.UNAUTHORIZED_ACCESS,
            ErrorCodeEnum.AUTH_UNAUTHORIZED_ACCESS
          )
        );
        return;
      }

      if (!allowedRoles.includes(req.user.role)) {
        logger.warn(
          { userId: req.user.userId, role: req.user.role, requestId: req.id },
          "User role not authorized"
        );
        next(
          new ForbiddenException(
            `Only ${allowedRoles.join(", ")} can access this resource`,
            ErrorCodeEnum.ACCESS_UNAUTHORIZED
          )
        );
        return;
      }

      next();
    };
  };
}

/**
 * Token payload of the caller; routes using it sit behind `verifyToken`.
 */
export function currentUser(req: Request): JWTPayload {
  if (!req.user) {
    throw new UnauthorizedException(
      MESSAGES.AUTH.UNAUTHORIZED_ACCESS,
      ErrorCodeEnum.AUTH_UNAUTHORIZED_ACCESS
    );
  }
  return req.user;
}

export const authMiddleware = {
  verifyToken: AuthMiddleware.verifyToken,
  authorize: AuthMiddleware.authorize,
};
