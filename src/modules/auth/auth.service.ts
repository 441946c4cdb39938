// file: src/modules/auth/auth.service.ts

import {
  ACCOUNT_STATUS,
  AUTH,
  MESSAGES,
  ROLES,
} from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { env } from "@/env";
import { logger } from "@/middlewares/pino-logger";
import { EmailService } from "@/services/email.service";
import {
  BadRequestException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
} from "@/utils/app-error.utils";
import { OTPUtil } from "@/utils/otp.utils";
import { comparePassword, hashPassword } from "@/utils/password.utils";

import type { IUser, TokenRevocationReason } from "../user/user.interface";
import { UserRepository, type UserStore } from "../user/user.repository";
import { UserService } from "../user/user.service";
import type {
  AuthServiceResponse,
  ChangePasswordPayload,
  JWTTokens,
  LoginPayload,
  PasswordResetPayload,
  RegisterPayload,
  RegisterResponse,
  VerifyEmailPayload,
} from "./auth.type";
import { AuthUtil } from "./auth.utils";

export type AuthNotifier = Pick<
  EmailService,
  "sendEmailVerification" | "sendWelcomeEmail" | "sendPasswordResetCode"
>;

export type AuthServiceOptions = {
  verificationRequired: boolean;
  now: () => Date;
};

export class AuthService {
  private users: UserStore;
  private userService: UserService;
  private emailService: AuthNotifier;
  private options: AuthServiceOptions;

  constructor(
    users: UserStore = new UserRepository(),
    userService: UserService = new UserService(users),
    emailService: AuthNotifier = new EmailService(),
    options: Partial<AuthServiceOptions> = {}
  ) {
    this.users = users;
    this.userService = userService;
    this.emailService = emailService;
    this.options = {
      verificationRequired:
        options.verificationRequired ?? env.EMAIL_VERIFICATION_REQUIRED,
      now: options.now ?? (() => new Date()),
    };
  }

  /**
   * Client self-registration. Cleaners and admins are created by an admin.
   */
  async register(payload: RegisterPayload): Promise<RegisterResponse> {
    const { verificationRequired } = this.options;

    const user = await this.userService.createUser({
      email: payload.email,
      password: payload.password,
      fullName: payload.fullName,
      phoneNumber: payload.phoneNumber,
      address: payload.address,
      role: ROLES.CLIENT,
      emailVerified: !verificationRequired,
      accountStatus: verificationRequired
        ? ACCOUNT_STATUS.PENDING
        : ACCOUNT_STATUS.ACTIVE,
    });

    logger.info({ userId: user._id.toString() }, "Client registered");

    if (!verificationRequired) {
      await this.sendWelcome(user);
      return {
        user: this.userService.toUserResponse(user),
        verificationRequired,
      };
    }

    const verification = await this.issueVerificationCode(user);
    return {
      user: this.userService.toUserResponse(user),
      verificationRequired,
      verification,
    };
  }

  /**
   * Login for every role. Repeated failures lock the account for
   * `AUTH.LOGIN_LOCKOUT_MINUTES`.
   */
  async login(payload: LoginPayload): Promise<AuthServiceResponse> {
    const now = this.options.now();
    const user = await this.users.findByEmailWithPassword(payload.email);

    if (!user || !user.password) {
      throw new UnauthorizedException(
        MESSAGES.AUTH.INVALID_CREDENTIALS,
        ErrorCodeEnum.AUTH_UNAUTHORIZED_ACCESS
      );
    }

    if (user.lockedUntil && user.lockedUntil > now) {
      throw new UnauthorizedException(
        MESSAGES.AUTH.ACCOUNT_LOCKED,
        ErrorCodeEnum.AUTH_ACCOUNT_LOCKED
      );
    }

    const isPasswordValid = await comparePassword(
      payload.password,
      user.password
    );

    if (!isPasswordValid) {
      await this.recordFailedLogin(user, now);
    }

    if (user.accountStatus === ACCOUNT_STATUS.SUSPENDED) {
      throw new ForbiddenException(
        MESSAGES.AUTH.ACCOUNT_SUSPENDED,
        ErrorCodeEnum.ACCESS_UNAUTHORIZED
      );
    }

    if (!user.emailVerified) {
      throw new ForbiddenException(
        MESSAGES.AUTH.EMAIL_NOT_VERIFIED,
        ErrorCodeEnum.ACCESS_UNAUTHORIZED
      );
    }

    await this.users.recordSuccessfulLogin(user._id.toString(), now);

    return {
      user: this.userService.toUserResponse(user),
      tokens: this.generateTokens(user),
    };
  }

  async verifyEmail(
    payload: VerifyEmailPayload
  ): Promise<{ email: string; emailVerified: true }> {
    const user = await this.users.findByEmailWithPassword(payload.email);
    if (!user) {
      throw new NotFoundException(
        MESSAGES.USER.USER_NOT_FOUND,
        ErrorCodeEnum.AUTH_USER_NOT_FOUND
      );
    }

    if (user.emailVerified) {
      throw new BadRequestException(MESSAGES.AUTH.EMAIL_ALREADY_VERIFIED);
    }

    if (user.emailVerificationAttempts >= AUTH.OTP_MAX_ATTEMPTS) {
      throw new BadRequestException(
        MESSAGES.AUTH.OTP_MAX_ATTEMPTS,
        ErrorCodeEnum.AUTH_TOO_MANY_ATTEMPTS
      );
    }

    const result = OTPUtil.validate(
      payload.code,
      user.emailVerificationCodeHash,
      user.emailVerificationExpiresAt,
      this.options.now()
    );

    if (!result.isValid) {
      await this.users.incrementVerificationAttempts(user._id.toString());
      throw new BadRequestException(
        result.isExpired ? MESSAGES.AUTH.OTP_EXPIRED : MESSAGES.AUTH.INVALID_OTP
      );
    }

    await this.users.markEmailAsVerified(user._id.toString());
    logger.info({ userId: user._id.toString() }, "Email verified");
    await this.sendWelcome(user);

    return { email: user.email, emailVerified: true };
  }

  async resendVerificationCode(
    email: string
  ): Promise<{ expiresAt: Date; expiresInMinutes: number }> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      throw new NotFoundException(
        MESSAGES.USER.USER_NOT_FOUND,
        ErrorCodeEnum.AUTH_USER_NOT_FOUND
      );
    }

    if (user.emailVerified) {
      throw new BadRequestException(MESSAGES.AUTH.EMAIL_ALREADY_VERIFIED);
    }

    return this.issueVerificationCode(user);
  }

  /**
   * Answers the same way whether or not the email belongs to an account.
   * Suspended and deleted accounts get no code.
   */
  async requestPasswordReset(
    email: string
  ): Promise<{ expiresInMinutes: number }> {
    const user = await this.users.findByEmail(email);

    if (!user || user.accountStatus === ACCOUNT_STATUS.SUSPENDED) {
      logger.info("Password reset requested for an unknown account");
      return { expiresInMinutes: AUTH.OTP_EXPIRY_MINUTES };
    }

    const otp = OTPUtil.generate(
      { length: AUTH.OTP_LENGTH, expiryMinutes: AUTH.OTP_EXPIRY_MINUTES },
      this.options.now()
    );
    await this.users.setPasswordResetCode(
      user._id.toString(),
      otp.codeHash,
      otp.expiresAt
    );
    await this.emailService.sendPasswordResetCode({
      to: user.email,
      userName: user.fullName,
      resetCode: otp.code,
      expiresInMinutes: otp.expiresInMinutes,
    });

    logger.info({ userId: user._id.toString() }, "Password reset requested");
    return { expiresInMinutes: otp.expiresInMinutes };
  }

  /**
   * Sets a new password from an emailed reset code. Refresh tokens issued
   * before the reset stop working.
   */
  async resetPassword(
    payload: PasswordResetPayload
  ): Promise<{ changedAt: Date }> {
    const user = await this.users.findByEmailWithPassword(payload.email);
    if (!user || user.accountStatus === ACCOUNT_STATUS.SUSPENDED) {
      throw new BadRequestException(
        MESSAGES.AUTH.PASSWORD_RESET_CODE_INVALID
      );
    }

    if (user.passwordResetAttempts >= AUTH.OTP_MAX_ATTEMPTS) {
      throw new BadRequestException(
        MESSAGES.AUTH.OTP_MAX_ATTEMPTS,
        ErrorCodeEnum.AUTH_TOO_MANY_ATTEMPTS
      );
    }

    const result = OTPUtil.validate(
      payload.code,
      user.passwordResetCodeHash,
      user.passwordResetExpiresAt,
      this.options.now()
    );
    if (!result.isValid) {
      await this.users.incrementPasswordResetAttempts(user._id.toString());
      logger.warn(
        { userId: user._id.toString(), expired: result.isExpired === true },
        "Password reset code rejected"
      );
      throw new BadRequestException(
        MESSAGES.AUTH.PASSWORD_RESET_CODE_INVALID
      );
    }

    const changedAt = this.options.now();
    await this.users.completePasswordReset(
      user._id.toString(),
      await hashPassword(payload.newPassword),
      changedAt
    );

    logger.info({ userId: user._id.toString() }, "Password reset");
    await this.userService.notifyPasswordChange(user, changedAt);

    return { changedAt };
  }

  /**
   * New access token from a refresh token that is neither revoked nor older
   * than the last password change.
   */
  async refreshAccessToken(
    refreshToken: string
  ): Promise<{ accessToken: string; expiresIn: string }> {
    const payload = AuthUtil.verifyRefreshToken(refreshToken);

    const revoked = await this.users.isRefreshTokenRevoked(
      payload.userId,
      AuthUtil.hashToken(refreshToken)
    );
    if (revoked) {
      throw new UnauthorizedException(
        MESSAGES.AUTH.REFRESH_TOKEN_INVALID,
        ErrorCodeEnum.AUTH_INVALID_TOKEN
      );
    }

    const user = await this.users.findById(payload.userId);
    if (
      !user ||
      user.isDeleted ||
      user.accountStatus === ACCOUNT_STATUS.SUSPENDED
    ) {
      throw new UnauthorizedException(
        MESSAGES.AUTH.REFRESH_TOKEN_INVALID,
        ErrorCodeEnum.AUTH_INVALID_TOKEN
      );
    }

    if (
      user.passwordChangedAt &&
      payload.iat < Math.floor(user.passwordChangedAt.getTime() / 1000)
    ) {
      throw new UnauthorizedException(
        MESSAGES.AUTH.REFRESH_TOKEN_INVALID,
        ErrorCodeEnum.AUTH_INVALID_TOKEN
      );
    }

    return {
      accessToken: AuthUtil.generateAccessToken(this.toTokenPayload(user)),
      expiresIn: env.JWT_EXPIRY,
    };
  }

  async logout(userId: string, refreshToken?: string): Promise<void> {
    if (refreshToken) {
      await this.revokeRefreshToken(userId, refreshToken, "logout");
    }
    logger.info({ userId }, "User logged out");
  }

  async changePassword(
    userId: string,
    payload: ChangePasswordPayload,
    refreshToken?: string
  ): Promise<{ changedAt: Date }> {
    const user = await this.users.findByIdWithPassword(userId);
    if (!user || !user.password) {
      throw new NotFoundException(
        MESSAGES.USER.USER_NOT_FOUND,
        ErrorCodeEnum.AUTH_USER_NOT_FOUND
      );
    }

    const matches = await comparePassword(
      payload.currentPassword,
      user.password
    );
    if (!matches) {
      throw new BadRequestException(
        MESSAGES.AUTH.CURRENT_PASSWORD_INCORRECT
      );
    }

    const changedAt = this.options.now();
    await this.users.updatePassword(
      userId,
      await hashPassword(payload.newPassword),
      changedAt
    );
    if (refreshToken) {
      await this.revokeRefreshToken(userId, refreshToken, "password_change");
    }

    logger.info({ userId }, "Password changed");
    await this.userService.notifyPasswordChange(user, changedAt);

    return { changedAt };
  }

  generateTokens(user: IUser): JWTTokens {
    return {
      accessToken: AuthUtil.generateAccessToken(this.toTokenPayload(user)),
      refreshToken: AuthUtil.generateRefreshToken(user._id.toString()),
      expiresIn: env.JWT_EXPIRY,
    };
  }

  private toTokenPayload(user: IUser) {
    return {
      userId: user._id.toString(),
      email: user.email,
      role: user.role,
      accountStatus: user.accountStatus,
      emailVerified: user.emailVerified,
    };
  }

  /**
   * Always throws; the failure is recorded first.
   */
  private async recordFailedLogin(user: IUser, now: Date): Promise<never> {
    const attempts = user.failedLoginAttempts + 1;
    const locks = attempts >= AUTH.MAX_LOGIN_ATTEMPTS;
    const lockedUntil = locks
      ? new Date(now.getTime() + AUTH.LOGIN_LOCKOUT_MINUTES * 60_000)
      : null;

    await this.users.recordFailedLogin(
      user._id.toString(),
      locks ? 0 : attempts,
      lockedUntil
    );

    if (locks) {
      logger.warn({ userId: user._id.toString() }, "Account locked");
      throw new UnauthorizedException(
        MESSAGES.AUTH.ACCOUNT_LOCKED,
        ErrorCodeEnum.AUTH_ACCOUNT_LOCKED
      );
    }

    throw new UnauthorizedException(
      MESSAGES.AUTH.INVALID_CREDENTIALS,
      ErrorCodeEnum.AUTH_UNAUTHORIZED_ACCESS
    );
  }

  private async revokeRefreshToken(
    userId: string,
    refreshToken: string,
    reason: TokenRevocationReason
  ): Promise<void> {
    const payload = AuthUtil.decodeRefreshToken(refreshToken);
    if (!payload || payload.userId !== userId) {
      return;
    }

    await this.users.revokeRefreshToken(userId, {
      tokenHash: AuthUtil.hashToken(refreshToken),
      reason,
      expiresAt: new Date(payload.exp * 1000),
      revokedAt: this.options.now(),
    });
  }

  private async issueVerificationCode(
    user: IUser
  ): Promise<{ expiresAt: Date; expiresInMinutes: number }> {
    const otp = OTPUtil.generate(
      { length: AUTH.OTP_LENGTH, expiryMinutes: AUTH.OTP_EXPIRY_MINUTES },
      this.options.now()
    );

    await this.users.setVerificationCode(
      user._id.toString(),
      otp.codeHash,
      otp.expiresAt
    );
    await this.emailService.sendEmailVerification({
      to: user.email,
      userName: user.fullName,
      verificationCode: otp.code,
      expiresInMinutes: otp.expiresInMinutes,
    });

    return { expiresAt: otp.expiresAt, expiresInMinutes: otp.expiresInMinutes };
  }

  private async sendWelcome(user: IUser): Promise<void> {
    await this.emailService.sendWelcomeEmail({
      to: user.email,
      userName: user.fullName,
      userType: user.role,
      loginLink: `${env.CLIENT_URL}/login`,
    });
  }
}
