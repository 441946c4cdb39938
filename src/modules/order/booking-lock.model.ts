// file: src/modules/order/booking-lock.model.ts

import type { PaginateModel } from "mongoose";
import { model } from "mongoose";

import { BaseSchemaUtil } from "@/utils/base-schema.utils";

/**
 * One document per contended calendar key. Bookings bump its version
 * inside their transaction so two writers on the same key conflict.
 */
export interface IBookingLock {
  key: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const bookingLockSchema = BaseSchemaUtil.createSchema<IBookingLock>({
  key: {
    type: String,
    required: true,
    unique: true,
  },
  version: {
    type: Number,
    default: 0,
  },
});

export const BookingLock = model<IBookingLock, PaginateModel<IBookingLock>>(
  "BookingLock",
  bookingLockSchema
);
