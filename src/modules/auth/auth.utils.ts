// file: src/modules/auth/auth.utils.ts
import { createHash, randomUUID } from "node:crypto";

import jwt from "jsonwebtoken";
import { z } from "zod";

import { ACCOUNT_STATUS, MESSAGES, ROLES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { env } from "@/env";
import { UnauthorizedException } from "@/utils/app-error.utils";

import type { JWTPayload } from "../user/user.type";

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
};

const accessTokenSchema = z.object({
  userId: z.string(),
  email: z.string(),
  role: z.enum([ROLES.CLIENT, ROLES.CLEANER, ROLES.ADMIN]),
  accountStatus: z.enum([
    ACCOUNT_STATUS.PENDING,
    ACCOUNT_STATUS.ACTIVE,
    ACCOUNT_STATUS.SUSPENDED,
  ]),
  emailVerified: z.boolean().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

const refreshTokenSchema = z.object({
  userId: z.string(),
  iat: z.number(),
  exp: z.number(),
});

export type RefreshTokenPayload = z.infer<typeof refreshTokenSchema>;

export class AuthUtil {
  static generateAccessToken(payload: JWTPayload): string {
    return jwt.sign(
      {
        userId: payload.userId,
        email: payload.email,
        role: payload.role,
        accountStatus: payload.accountStatus,
        emailVerified: payload.emailVerified,
      },
      env.JWT_SECRET,
      { expiresIn: AuthUtil.toSeconds(env.JWT_EXPIRY) }
    );
  }

  static generateRefreshToken(userId: string): string {
    return jwt.sign({ userId }, env.JWT_REFRESH_SECRET, {
      expiresIn: AuthUtil.toSeconds(env.JWT_REFRESH_EXPIRY),
      jwtid: randomUUID(),
    });
  }

  static verifyAccessToken(token: string): JWTPayload {
    return AuthUtil.verify(token, env.JWT_SECRET, accessTokenSchema);
  }

  static verifyRefreshToken(token: string): RefreshTokenPayload {
    return AuthUtil.verify(token, env.JWT_REFRESH_SECRET, refreshTokenSchema);
  }

  /**
   * Like `verifyRefreshToken`, but an invalid or expired token is `null`.
   */
  static decodeRefreshToken(token: string): RefreshTokenPayload | null {
    return AuthUtil.decode(token, env.JWT_REFRESH_SECRET, refreshTokenSchema);
  }

  /**
   * Revoked refresh tokens are stored by digest, never verbatim.
   */
  static hashToken(token: string): string {
    return createHash("sha256").update(token).digest("hex");
  }

  /**
   * `"15m"`, `"7d"`, `"3600"` to seconds.
   */
  static toSeconds(expiry: string): number {
    const match = /^(\d+)([dhms])?$/.exec(expiry.trim());
    if (!match) {
      throw new Error(`Invalid token expiry: ${expiry}`);
    }
    return Number(match[1]) * UNIT_SECONDS[match[2] ?? "s"];
  }

  private static verify<T extends z.ZodTypeAny>(
    token: string,
    secret: string,
    schema: T
  ): z.infer<T> {
    const payload = AuthUtil.decode(token, secret, schema);
    if (payload === null) {
      throw new UnauthorizedException(
        MESSAGES.AUTH.INVALID_TOKEN,
        ErrorCodeEnum.AUTH_INVALID_TOKEN
      );
    }
    return payload;
  }

  private static decode<T extends z.ZodTypeAny>(
    token: string,
    secret: string,
    schema: T
  ): z.infer<T> | null {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, secret);
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        return null;
      }
      throw error;
    }

    const parsed = schema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }
}
