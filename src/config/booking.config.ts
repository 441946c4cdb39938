// file: src/config/booking.config.ts

import { env } from "@/env";

/**
 * Daily booking calendar. The same window applies to every date.
 */
export interface BookingConfig {
  workingHoursStart: string;
  workingHoursEnd: string;
  slotDurationMinutes: number;
}

export const BOOKING_CONFIG: BookingConfig = {
  workingHoursStart: env.WORKING_HOURS_START,
  workingHoursEnd: env.WORKING_HOURS_END,
  slotDurationMinutes: env.SLOT_DURATION_MINUTES,
};
