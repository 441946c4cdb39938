// file: src/utils/time.utils.ts

import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";

dayjs.extend(customParseFormat);

const TIME_PATTERN = /^\s*(\d{1,2})(?::(\d{1,2}))?\s*(am|pm)?\s*$/i;
const TIME_24H_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;
const DATE_FORMAT = "YYYY-MM-DD";

const pad = (value: number) => value.toString().padStart(2, "0");

export const parseTimeTo24Hour = (value?: string): string | null => {
  if (!value) {
    return null;
  }
  const match = value.match(TIME_PATTERN);
  if (!match) {
    return null;
  }
  const [, hourPart, minutePart = "00", period] = match;
  let hour = Number(hourPart);
  let minute = Number(minutePart) || 0;

  if (period) {
    if (period.toLowerCase() === "pm" && hour < 12) {
      hour += 12;
    }
    if (period.toLowerCase() === "am" && hour === 12) {
      hour = 0;
    }
  }

  hour = Math.max(0, Math.min(23, hour));
  minute = Math.max(0, Math.min(59, minute));

  return `${pad(hour)}:${pad(minute)}`;
};

export const formatTimeTo12Hour = (value?: string): string => {
  if (!value) return "";
  const normalized = parseTimeTo24Hour(value) || value.trim();
  const [hourPart = "0", minutePart = "00"] = normalized.split(":");
  const hour = Number(hourPart);
  const minute = Number(minutePart) || 0;

  if (Number.isNaN(hour) || Number.isNaN(minute)) {
    return value;
  }

  const period = hour >= 12 ? "PM" : "AM";
  const displayHour = ((hour + 11) % 12) + 1;

  return `${displayHour}:${pad(minute)} ${period}`;
};

/**
 * Strict 24-hour `H:mm` / `HH:mm` to minutes since midnight.
 * Unlike `parseTimeTo24Hour` nothing is clamped: out-of-range input is `null`.
 */
export const toMinutesOfDay = (value: string): number | null => {
  const match = TIME_24H_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 60 + Number(match[2]);
};

export const fromMinutesOfDay = (minutes: number): string =>
  `${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;

export const isCalendarDate = (value: string): boolean =>
  dayjs(value, DATE_FORMAT, true).isValid();

export const todayAsCalendarDate = (now: Date = new Date()): string =>
  dayjs(now).format(DATE_FORMAT);
