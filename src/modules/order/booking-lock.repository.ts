// file: src/modules/order/booking-lock.repository.ts

import type { ClientSession } from "mongoose";

import { BaseRepository } from "@/modules/base/base.repository";

import { BookingLock, type IBookingLock } from "./booking-lock.model";

export interface BookingLockStore {
  acquire(key: string, session?: ClientSession): Promise<void>;
}

export const dayLockKey = (scheduledDate: string): string =>
  `day:${scheduledDate}`;

export const cleanerLockKey = (
  cleanerId: string,
  scheduledDate: string
): string => `cleaner:${cleanerId}:${scheduledDate}`;

export class BookingLockRepository
  extends BaseRepository<IBookingLock>
  implements BookingLockStore
{
  constructor() {
    super(BookingLock);
  }

  /**
   * Writes the lock document in the caller's transaction. A second
   * transaction touching the same key fails with a write conflict.
   */
  async acquire(key: string, session?: ClientSession): Promise<void> {
    await this.model
      .findOneAndUpdate(
        { key },
        { $inc: { version: 1 } },
        { upsert: true, new: true, session }
      )
      .exec();
  }
}
