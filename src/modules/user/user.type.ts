// file: src/modules/user/user.type.ts

import type { PaginationQuery } from "@/ts/pagination.types";

import type { AccountStatus, UserRole } from "./user.interface";

export type UserResponse = {
  _id: string;
  email: string;
  fullName: string;
  phone: string;
  address: string;
  role: UserRole;
  accountStatus: AccountStatus;
  emailVerified: boolean;
  serviceIds?: string[];
  lastLoginAt?: Date;

  createdAt: Date;
  updatedAt: Date;
};

export type UserCreatePayload = {
  email: string;
  password: string;
  fullName: string;
  phoneNumber?: string;
  address?: string;
  role: UserRole;
  emailVerified?: boolean;
  accountStatus?: AccountStatus;
};

export type CleanerCreatePayload = {
  fullName: string;
  email: string;
  phoneNumber?: string;
  serviceIds?: string[];
};

export type CleanerCreationResult = {
  cleaner: UserResponse;
  emailSent: boolean;
  /**
   * Only returned when email delivery fails so admins can share credentials manually.
   */
  temporaryPassword?: string;
};

export type CleanerListQuery = PaginationQuery & {
  search?: string;
  serviceId?: string;
};

export type UpdateProfilePayload = {
  fullName?: string;
  phoneNumber?: string;
  address?: string;
};

export type JWTPayload = {
  userId: string;
  email: string;
  role: UserRole;
  accountStatus: AccountStatus;
  emailVerified?: boolean;
  iat?: number;
  exp?: number;
};
