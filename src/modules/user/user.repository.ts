// file: src/modules/user/user.repository.ts

import type {
  FilterQuery,
  PaginateOptions,
  PaginateResult,
  UpdateQuery,
} from "mongoose";

import { ROLES } from "@/constants/app.constants";
import { BaseRepository } from "@/modules/base/base.repository";

import type { IRevokedRefreshToken, IUser } from "./user.interface";
import { User } from "./user.model";

const WITH_SECRETS =
  "+password +emailVerificationCodeHash +passwordResetCodeHash";

export interface UserStore {
  findById(userId: string): Promise<IUser | null>;
  findByEmail(email: string): Promise<IUser | null>;
  findByEmailWithPassword(email: string): Promise<IUser | null>;
  findByIdWithPassword(userId: string): Promise<IUser | null>;
  findCleanerById(cleanerId: string): Promise<IUser | null>;
  create(data: Partial<IUser>): Promise<IUser>;
  updateById(
    userId: string,
    data: UpdateQuery<IUser>
  ): Promise<IUser | null>;
  paginate(
    filter: FilterQuery<IUser>,
    options: PaginateOptions
  ): Promise<PaginateResult<IUser>>;
  setVerificationCode(
    userId: string,
    codeHash: string,
    expiresAt: Date
  ): Promise<void>;
  incrementVerificationAttempts(userId: string): Promise<void>;
  markEmailAsVerified(userId: string): Promise<void>;
  setPasswordResetCode(
    userId: string,
    codeHash: string,
    expiresAt: Date
  ): Promise<void>;
  incrementPasswordResetAttempts(userId: string): Promise<void>;
  completePasswordReset(
    userId: string,
    hashedPassword: string,
    changedAt: Date
  ): Promise<void>;
  recordFailedLogin(
    userId: string,
    attempts: number,
    lockedUntil: Date | null
  ): Promise<void>;
  recordSuccessfulLogin(userId: string, at: Date): Promise<void>;
  updatePassword(
    userId: string,
    hashedPassword: string,
    changedAt: Date
  ): Promise<void>;
  revokeRefreshToken(userId: string, entry: IRevokedRefreshToken): Promise<void>;
  isRefreshTokenRevoked(userId: string, tokenHash: string): Promise<boolean>;
}

export class UserRepository
  extends BaseRepository<IUser>
  implements UserStore
{
  constructor() {
    super(User);
  }

  async findByEmail(email: string) {
    return this.model
      .findOne({ email: email.toLowerCase(), isDeleted: { $ne: true } })
      .exec();
  }

  async findByEmailWithPassword(email: string) {
    return this.model
      .findOne({ email: email.toLowerCase(), isDeleted: { $ne: true } })
      .select(WITH_SECRETS)
      .exec();
  }

  async findByIdWithPassword(userId: string) {
    return this.model
      .findOne({ _id: userId, isDeleted: { $ne: true } })
      .select(WITH_SECRETS)
      .exec();
  }

  async findCleanerById(cleanerId: string) {
    return this.model
      .findOne({
        _id: cleanerId,
        role: ROLES.CLEANER,
        isDeleted: { $ne: true },
      })
      .exec();
  }

  async setVerificationCode(
    userId: string,
    codeHash: string,
    expiresAt: Date
  ): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        {
          $set: {
            emailVerificationCodeHash: codeHash,
            emailVerificationExpiresAt: expiresAt,
            emailVerificationAttempts: 0,
          },
        }
      )
      .exec();
  }

  async incrementVerificationAttempts(userId: string): Promise<void> {
    await this.model
      .updateOne({ _id: userId }, { $inc: { emailVerificationAttempts: 1 } })
      .exec();
  }

  async markEmailAsVerified(userId: string): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        {
          $set: { emailVerified: true, accountStatus: "active" },
          $unset: {
            emailVerificationCodeHash: 1,
            emailVerificationExpiresAt: 1,
          },
        }
      )
      .exec();
  }

  async setPasswordResetCode(
    userId: string,
    codeHash: string,
    expiresAt: Date
  ): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        {
          $set: {
            passwordResetCodeHash: codeHash,
            passwordResetExpiresAt: expiresAt,
            passwordResetAttempts: 0,
          },
        }
      )
      .exec();
  }

  async incrementPasswordResetAttempts(userId: string): Promise<void> {
    await this.model
      .updateOne({ _id: userId }, { $inc: { passwordResetAttempts: 1 } })
      .exec();
  }

  /**
   * New password, spent reset code and a cleared login lockout in one write.
   */
  async completePasswordReset(
    userId: string,
    hashedPassword: string,
    changedAt: Date
  ): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        {
          $set: {
            password: hashedPassword,
            passwordChangedAt: changedAt,
            passwordResetAttempts: 0,
            failedLoginAttempts: 0,
            lockedUntil: null,
          },
          $unset: { passwordResetCodeHash: 1, passwordResetExpiresAt: 1 },
        }
      )
      .exec();
  }

  async recordFailedLogin(
    userId: string,
    attempts: number,
    lockedUntil: Date | null
  ): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        { $set: { failedLoginAttempts: attempts, lockedUntil } }
      )
      .exec();
  }

  async recordSuccessfulLogin(userId: string, at: Date): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        { $set: { failedLoginAttempts: 0, lockedUntil: null, lastLoginAt: at } }
      )
      .exec();
  }

  async updatePassword(
    userId: string,
    hashedPassword: string,
    changedAt: Date
  ): Promise<void> {
    await this.model
      .updateOne(
        { _id: userId },
        { $set: { password: hashedPassword, passwordChangedAt: changedAt } }
      )
      .exec();
  }

  async revokeRefreshToken(
    userId: string,
    entry: IRevokedRefreshToken
  ): Promise<void> {
    // one update cannot $pull and $push the same path
    await this.model
      .updateOne(
        { _id: userId },
        {
          $pull: {
            revokedRefreshTokens: { expiresAt: { $lt: entry.revokedAt } },
          },
        }
      )
      .exec();
    await this.model
      .updateOne({ _id: userId }, { $push: { revokedRefreshTokens: entry } })
      .exec();
  }

  async isRefreshTokenRevoked(
    userId: string,
    tokenHash: string
  ): Promise<boolean> {
    return this.exists({
      _id: userId,
      "revokedRefreshTokens.tokenHash": tokenHash,
    });
  }
}
