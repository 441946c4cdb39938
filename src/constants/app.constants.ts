// file: src/constants/app.constants.ts
import { env } from "@/env";

export const APP = {
  NAME: env.APP_NAME || "HomeClean",
  VERSION: "1.0.0",
} as const;

export const ROLES = {
  CLIENT: "client",
  CLEANER: "cleaner",
  ADMIN: "admin",
} as const;

export const ACCOUNT_STATUS = {
  PENDING: "pending",
  ACTIVE: "active",
  SUSPENDED: "suspended",
} as const;

export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_LIMIT: 10,
  MAX_LIMIT: 100,
} as const;

export const AUTH = {
  ACCESS_TOKEN_EXPIRY: "15m",
  REFRESH_TOKEN_EXPIRY: "7d",

  OTP_LENGTH: 4,
  OTP_EXPIRY_MINUTES: 10,
  OTP_MAX_ATTEMPTS: 5,

  MAX_LOGIN_ATTEMPTS: 5,
  LOGIN_LOCKOUT_MINUTES: 15,

  MIN_PASSWORD_LENGTH: 8,
} as const;

export const CURRENCY = "USD";

export const MESSAGES = {
  AUTH: {
    REGISTER_SUCCESS: "Registration successful.",
    REGISTER_VERIFY_EMAIL:
      "Registration successful. Please check your email to verify your account.",
    LOGIN_SUCCESS: "Login successful.",
    UNAUTHORIZED_ACCESS: "You do not have permission to perform this action.",
    EMAIL_VERIFIED_SUCCESS: "Email verified successfully. You can now login.",
    INVALID_CREDENTIALS: "Invalid email or password.",
    EMAIL_ALREADY_EXISTS: "Email already registered.",
    EMAIL_NOT_VERIFIED: "Please verify your email before login.",
    EMAIL_ALREADY_VERIFIED: "Email is already verified.",
    ACCOUNT_SUSPENDED: "Your account has been suspended.",
    ACCOUNT_LOCKED:
      "Too many failed login attempts. Please try again later.",
    INVALID_OTP: "Invalid OTP code.",
    OTP_EXPIRED: "OTP has expired. Please request a new one.",
    OTP_MAX_ATTEMPTS:
      "Maximum OTP attempts exceeded. Please request a new one.",
    LOGOUT_SUCCESS: "Logged out successfully.",
    REFRESH_TOKEN_INVALID: "Invalid or expired refresh token.",
    INVALID_TOKEN: "Invalid or expired access token.",
    CURRENT_PASSWORD_INCORRECT: "Current password is incorrect.",
    PASSWORD_CHANGED:
      "Password changed successfully. Please login again with your new password.",
    VERIFICATION_CODE_SENT: "Verification code sent to your email.",
    PASSWORD_RESET_REQUESTED:
      "If the email is registered, a password reset code has been sent.",
    PASSWORD_RESET_CODE_INVALID: "Invalid or expired password reset code.",
    PASSWORD_RESET_SUCCESS:
      "Password reset successfully. Please login with your new password.",
  },
  USER: {
    USER_NOT_FOUND: "User not found.",
    USER_UPDATED: "User updated successfully.",
    CLEANER_NOT_FOUND: "Cleaner not found.",
  },
  SERVICE: {
    NOT_FOUND: "Service not found.",
    UNAVAILABLE: "Service is not available.",
    IN_USE: "Service is referenced by orders. Unpublish it instead.",
  },
  PRICING: {
    BLOCK_NOT_FOUND: "Pricing block not found.",
  },
  ORDER: {
    NOT_FOUND: "Order not found.",
    CREATED: "Order created successfully.",
    TIMESLOT_UNAVAILABLE: "Selected timeslot is not available.",
    CLEANER_UNAVAILABLE: "Cleaner not available for this timeslot.",
  },
  VALIDATION: {
    INVALID_EMAIL: "Invalid email format.",
    PASSWORD_TOO_SHORT: "Password must be at least 8 characters.",
    INVALID_PHONE: "Invalid phone number.",
  },
} as const;
