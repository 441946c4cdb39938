// file: src/modules/auth/auth.type.ts

import type { UserResponse } from "../user/user.type";

export type RegisterPayload = {
  email: string;
  password: string;
  fullName: string;
  phoneNumber?: string;
  address?: string;
};

export type LoginPayload = {
  email: string;
  password: string;
};

export type JWTTokens = {
  accessToken: string;
  refreshToken: string;
  expiresIn: string;
};

/**
 * Service layer returns both tokens; the controller moves the refresh
 * token into a cookie.
 */
export type AuthServiceResponse = {
  user: UserResponse;
  tokens: JWTTokens;
};

export type AuthControllerResponse = {
  user: UserResponse;
  accessToken: string;
  expiresIn: string;
};

export type RegisterResponse = {
  user: UserResponse;
  verificationRequired: boolean;
  verification?: { expiresAt: Date; expiresInMinutes: number };
};

export type VerifyEmailPayload = {
  email: string;
  code: string;
};

export type PasswordResetPayload = {
  email: string;
  code: string;
  newPassword: string;
};

export type ChangePasswordPayload = {
  currentPassword: string;
  newPassword: string;
};
