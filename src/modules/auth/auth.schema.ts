// file: src/modules/auth/auth.schema.ts

import { z } from "zod";

import { AUTH, MESSAGES } from "@/constants/app.constants";
import { phoneNumberSchema } from "@/modules/user/user.schema";

const email = z.string().trim().email(MESSAGES.VALIDATION.INVALID_EMAIL);
const password = z
  .string()
  .min(AUTH.MIN_PASSWORD_LENGTH, MESSAGES.VALIDATION.PASSWORD_TOO_SHORT)
  .max(128);

export const registerSchema = z.object({
  body: z.object({
    email,
    password,
    fullName: z.string().trim().min(2).max(100),
    phoneNumber: phoneNumberSchema.optional(),
    address: z.string().trim().min(2).max(250).optional(),
  }),
});

export const loginSchema = z.object({
  body: z.object({
    email,
    password: z.string().min(1, "Password is required"),
  }),
});

const otpCode = z
  .string()
  .regex(
    new RegExp(`^\\d{${AUTH.OTP_LENGTH}}$`),
    `Verification code must be ${AUTH.OTP_LENGTH} digits`
  );

export const verifyEmailSchema = z.object({
  body: z.object({
    email,
    code: otpCode,
  }),
});

export const resendVerificationCodeSchema = z.object({
  body: z.object({
    email,
  }),
});

export const forgotPasswordSchema = z.object({
  body: z.object({
    email,
  }),
});

export const resetPasswordSchema = z.object({
  body: z
    .object({
      email,
      code: otpCode,
      newPassword: password,
      confirmPassword: z.string().min(1, "Password confirmation is required"),
    })
    .refine((data) => data.newPassword === data.confirmPassword, {
      message: "Passwords do not match",
      path: ["confirmPassword"],
    }),
});

export const changePasswordSchema = z.object({
  body: z
    .object({
      currentPassword: z.string().min(1, "Current password is required"),
      newPassword: password,
      confirmPassword: z.string().min(1, "Password confirmation is required"),
    })
    .refine((data) => data.newPassword === data.confirmPassword, {
      message: "Passwords do not match",
      path: ["confirmPassword"],
    })
    .refine((data) => data.currentPassword !== data.newPassword, {
      message: "New password must be different from current password",
      path: ["newPassword"],
    }),
});
