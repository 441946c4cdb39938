import { z } from "zod";

import { objectIdSchema } from "@/utils/validators.utils";

const serviceBody = z.object({
  name: z.string().trim().min(2).max(120),
  description: z.string().trim().max(2000).optional(),
  beforeImage: z.string().url().optional(),
  afterImage: z.string().url().optional(),
  isPublished: z.boolean().optional(),
});

export const serviceIdParamSchema = z.object({
  params: z.object({
    serviceId: objectIdSchema,
  }),
});

export const createCleaningServiceSchema = z.object({
  body: serviceBody,
});

export const updateCleaningServiceSchema = z.object({
  params: z.object({
    serviceId: objectIdSchema,
  }),
  body: serviceBody
    .partial()
    .refine((body) => Object.keys(body).length > 0, {
      message: "At least one field is required",
    }),
});
