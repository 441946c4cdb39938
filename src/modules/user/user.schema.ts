// file: src/modules/user/user.schema.ts

import { z } from "zod";

import { MESSAGES } from "@/constants/app.constants";
import { objectIdSchema } from "@/utils/validators.utils";

export const phoneNumberSchema = z
  .string()
  .trim()
  .regex(/^\+?[\d\s()-]{7,20}$/, MESSAGES.VALIDATION.INVALID_PHONE);

export const updateProfileSchema = z.object({
  body: z
    .object({
      fullName: z.string().trim().min(2).max(100).optional(),
      phoneNumber: phoneNumberSchema.optional(),
      address: z.string().trim().min(2).max(250).optional(),
    })
    .refine((body) => Object.keys(body).length > 0, {
      message: "At least one field is required",
    }),
});

export const createCleanerSchema = z.object({
  body: z.object({
    fullName: z.string().trim().min(2).max(100),
    email: z.string().trim().email(MESSAGES.VALIDATION.INVALID_EMAIL),
    phoneNumber: phoneNumberSchema.optional(),
    serviceIds: z.array(objectIdSchema).max(50).optional(),
  }),
});

export const listCleanersSchema = z.object({
  query: z.object({
    page: z.coerce.number().int().positive().optional(),
    limit: z.coerce.number().int().positive().optional(),
    sort: z.string().optional(),
    search: z.string().trim().max(100).optional(),
    serviceId: objectIdSchema.optional(),
  }),
});
