// file: src/modules/user/user.interface.ts

import type { Types } from "mongoose";

import type { ACCOUNT_STATUS, ROLES } from "@/constants/app.constants";

export type UserRole = (typeof ROLES)[keyof typeof ROLES];
export type AccountStatus = (typeof ACCOUNT_STATUS)[keyof typeof ACCOUNT_STATUS];

export type TokenRevocationReason =
  | "logout"
  | "password_change"
  | "security_incident";

export interface IRevokedRefreshToken {
  tokenHash: string;
  reason: TokenRevocationReason;
  expiresAt: Date;
  revokedAt: Date;
}

export interface IUser {
  _id: Types.ObjectId;
  email: string;
  password?: string;
  fullName: string;
  phoneNumber?: string;
  address?: string;
  role: UserRole;
  accountStatus: AccountStatus;
  emailVerified: boolean;

  emailVerificationCodeHash?: string;
  emailVerificationExpiresAt?: Date;
  emailVerificationAttempts: number;

  passwordResetCodeHash?: string;
  passwordResetExpiresAt?: Date;
  passwordResetAttempts: number;

  failedLoginAttempts: number;
  lockedUntil?: Date | null;
  lastLoginAt?: Date;
  passwordChangedAt?: Date;
  revokedRefreshTokens: IRevokedRefreshToken[];

  // cleaners only
  serviceIds: Types.ObjectId[];

  isDeleted: boolean;
  deletedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}
