// file: src/modules/order/availability.checker.ts

import type { BookingConfig } from "@/config/booking.config";
import {
  fromMinutesOfDay,
  isCalendarDate,
  toMinutesOfDay,
} from "@/utils/time.utils";

import type { OrderStatus } from "./order.interface";
import { SLOT_HOLDING_STATUSES } from "./order.interface";

export const DEFAULT_REQUESTED_DURATION_MINUTES = 120;

/**
 * The fields of an order the calendar cares about.
 */
export type ScheduledOrder = {
  _id: { toString(): string };
  scheduledDate: string;
  scheduledTime: string;
  totalDurationMinutes: number;
  status: OrderStatus;
};

/**
 * Decides whether an interval fits the working day without overlapping
 * an order that still holds its slot. Pure: the caller supplies the orders.
 */
export class AvailabilityChecker {
  private readonly startMinutes: number;
  private readonly endMinutes: number;
  private readonly slotMinutes: number;

  constructor(config: BookingConfig) {
    const start = toMinutesOfDay(config.workingHoursStart);
    const end = toMinutesOfDay(config.workingHoursEnd);

    if (start === null || end === null || start >= end) {
      throw new Error(
        `Invalid working hours ${config.workingHoursStart}-${config.workingHoursEnd}`
      );
    }
    if (
      !Number.isInteger(config.slotDurationMinutes) ||
      config.slotDurationMinutes <= 0
    ) {
      throw new Error(`Invalid slot duration ${config.slotDurationMinutes}`);
    }

    this.startMinutes = start;
    this.endMinutes = end;
    this.slotMinutes = config.slotDurationMinutes;
  }

  get workingHours() {
    return {
      start: fromMinutesOfDay(this.startMinutes),
      end: fromMinutesOfDay(this.endMinutes),
    };
  }

  get slotDurationMinutes(): number {
    return this.slotMinutes;
  }

  /**
   * `[time, time + duration)` must sit inside working hours and be disjoint
   * from every pending or confirmed order on `date`. Malformed input is
   * never available.
   */
  isAvailable(
    date: string,
    time: string,
    durationMinutes: number,
    existingOrders: readonly ScheduledOrder[],
    excludeOrderId?: string
  ): boolean {
    if (!isCalendarDate(date)) {
      return false;
    }

    const start = toMinutesOfDay(time);
    if (
      start === null ||
      !Number.isFinite(durationMinutes) ||
      durationMinutes <= 0
    ) {
      return false;
    }

    const end = start + durationMinutes;
    if (start < this.startMinutes || end > this.endMinutes) {
      return false;
    }

    return existingOrders.every((order) => {
      if (order.scheduledDate !== date) return true;
      if (!SLOT_HOLDING_STATUSES.includes(order.status)) return true;
      if (excludeOrderId && order._id.toString() === excludeOrderId) return true;

      const orderStart = toMinutesOfDay(order.scheduledTime);
      if (orderStart === null) return true;
      const orderEnd = orderStart + order.totalDurationMinutes;

      return end <= orderStart || start >= orderEnd;
    });
  }

  /**
   * Slot-grid start times on `date` where a job of `durationMinutes` fits.
   */
  availableSlots(
    date: string,
    existingOrders: readonly ScheduledOrder[],
    durationMinutes: number = DEFAULT_REQUESTED_DURATION_MINUTES
  ): string[] {
    if (!isCalendarDate(date)) {
      return [];
    }

    const slots: string[] = [];
    for (
      let minute = this.startMinutes;
      minute < this.endMinutes;
      minute += this.slotMinutes
    ) {
      const time = fromMinutesOfDay(minute);
      if (this.isAvailable(date, time, durationMinutes, existingOrders)) {
        slots.push(time);
      }
    }
    return slots;
  }

  isOnSlotGrid(time: string): boolean {
    const minutes = toMinutesOfDay(time);
    return (
      minutes !== null &&
      minutes >= this.startMinutes &&
      (minutes - this.startMinutes) % this.slotMinutes === 0
    );
  }
}
