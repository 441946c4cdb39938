import { z } from "zod";

import { pricingSelectionSchema } from "@/modules/pricing/pricing.schema";
import { isCalendarDate } from "@/utils/time.utils";
import { objectIdSchema } from "@/utils/validators.utils";

import { ORDER_STATUSES } from "./order.interface";

const calendarDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine(isCalendarDate, "Invalid calendar date");

const timeOfDay = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:mm (24-hour)");

const count = z.number().int().nonnegative().max(1000).optional();

const parametersSchema = z.object({
  removableCushionCount: count,
  unremovableCushionCount: count,
  pillowCount: count,
  windowCount: count,
  rugCount: count,
  rugWidth: z.number().nonnegative().optional(),
  rugLength: z.number().nonnegative().optional(),
  baseCleaning: z.boolean().optional(),
  petHair: z.boolean().optional(),
  urineStains: z.boolean().optional(),
  acceleratedDrying: z.boolean().optional(),
});

const orderItemSchema = z.object({
  serviceId: objectIdSchema,
  parameters: parametersSchema.optional(),
  selections: z.array(pricingSelectionSchema).optional(),
});

const orderItems = z.array(orderItemSchema).min(1).max(20);

export const orderIdParamSchema = z.object({
  params: z.object({
    orderId: objectIdSchema,
  }),
});

export const calculateOrderSchema = z.object({
  body: z.object({
    items: orderItems,
  }),
});

export const createOrderSchema = z.object({
  body: z.object({
    scheduledDate: calendarDate,
    scheduledTime: timeOfDay,
    items: orderItems,
    notes: z.string().trim().max(1000).optional(),
  }),
});

export const timeslotsQuerySchema = z.object({
  query: z.object({
    date: calendarDate,
    durationMinutes: z.coerce.number().int().positive().max(720).optional(),
  }),
});

export const orderListQuerySchema = z.object({
  query: z
    .object({
      page: z.coerce.number().int().positive().optional(),
      limit: z.coerce.number().int().positive().optional(),
      sort: z.string().optional(),
      status: z.enum(ORDER_STATUSES).optional(),
      dateFrom: calendarDate.optional(),
      dateTo: calendarDate.optional(),
    })
    .refine(
      (query) =>
        !query.dateFrom || !query.dateTo || query.dateFrom <= query.dateTo,
      { message: "dateFrom must not be after dateTo", path: ["dateFrom"] }
    ),
});

export const updateOrderStatusSchema = z.object({
  params: z.object({
    orderId: objectIdSchema,
  }),
  body: z.object({
    status: z.enum(ORDER_STATUSES),
    notes: z.string().trim().max(1000).optional(),
  }),
});

export const assignCleanerSchema = z.object({
  params: z.object({
    orderId: objectIdSchema,
  }),
  body: z.object({
    cleanerId: objectIdSchema,
  }),
});
