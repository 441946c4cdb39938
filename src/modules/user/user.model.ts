// file: src/modules/user/user.model.ts

import type { PaginateModel } from "mongoose";
import { model, Schema } from "mongoose";

import { ACCOUNT_STATUS, ROLES } from "@/constants/app.constants";
import { BaseSchemaUtil } from "@/utils/base-schema.utils";

import type { IRevokedRefreshToken, IUser } from "./user.interface";

const revokedRefreshTokenSchema = new Schema<IRevokedRefreshToken>(
  {
    tokenHash: { type: String, required: true },
    reason: {
      type: String,
      enum: ["logout", "password_change", "security_incident"],
      required: true,
    },
    expiresAt: { type: Date, required: true },
    revokedAt: { type: Date, default: Date.now },
  },
  { _id: false }
);

const userSchema = BaseSchemaUtil.createSchema<IUser>({
  ...BaseSchemaUtil.softDeleteFields(),
  email: {
    type: String,
    required: true,
    unique: true,
    lowercase: true,
    trim: true,
  },
  password: {
    type: String,
    select: false,
  },
  fullName: {
    type: String,
    required: true,
    trim: true,
  },
  phoneNumber: {
    type: String,
    trim: true,
  },
  address: {
    type: String,
    trim: true,
  },
  role: {
    type: String,
    enum: Object.values(ROLES),
    default: ROLES.CLIENT,
    index: true,
  },
  accountStatus: {
    type: String,
    enum: Object.values(ACCOUNT_STATUS),
    default: ACCOUNT_STATUS.PENDING,
    index: true,
  },
  emailVerified: {
    type: Boolean,
    default: false,
  },
  emailVerificationCodeHash: {
    type: String,
    select: false,
  },
  emailVerificationExpiresAt: {
    type: Date,
  },
  emailVerificationAttempts: {
    type: Number,
    default: 0,
  },
  passwordResetCodeHash: {
    type: String,
    select: false,
  },
  passwordResetExpiresAt: {
    type: Date,
  },
  passwordResetAttempts: {
    type: Number,
    default: 0,
  },
  failedLoginAttempts: {
    type: Number,
    default: 0,
  },
  lockedUntil: {
    type: Date,
    default: null,
  },
  lastLoginAt: {
    type: Date,
  },
  passwordChangedAt: {
    type: Date,
  },
  revokedRefreshTokens: {
    type: [revokedRefreshTokenSchema],
    default: [],
    select: false,
  },
  serviceIds: [
    {
      type: Schema.Types.ObjectId,
      ref: "CleaningService",
    },
  ],
});

userSchema.index({ role: 1, isDeleted: 1 });

export const User = model<IUser, PaginateModel<IUser>>("User", userSchema);
