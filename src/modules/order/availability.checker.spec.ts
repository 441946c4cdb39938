import { order } from "../../../test/factories";

import { AvailabilityChecker } from "./availability.checker";

describe("AvailabilityChecker", () => {
  const checker = new AvailabilityChecker({
    workingHoursStart: "10:00",
    workingHoursEnd: "19:00",
    slotDurationMinutes: 30,
  });
  const date = "2030-06-10";
  const booked = order({
    scheduledDate: date,
    scheduledTime: "14:00",
    totalDurationMinutes: 120,
    status: "confirmed",
  });

  describe("isAvailable", () => {
    it("rejects a start before working hours", () => {
      expect(checker.isAvailable(date, "09:30", 60, [])).toBe(false);
    });

    it("requires the whole job to end by closing time", () => {
      expect(checker.isAvailable(date, "17:30", 120, [])).toBe(false);
      expect(checker.isAvailable(date, "17:00", 120, [])).toBe(true);
    });

    it("rejects overlap with a confirmed order", () => {
      expect(checker.isAvailable(date, "15:00", 60, [booked])).toBe(false);
      expect(checker.isAvailable(date, "13:00", 120, [booked])).toBe(false);
    });

    it("treats touching intervals as free", () => {
      expect(checker.isAvailable(date, "16:00", 60, [booked])).toBe(true);
      expect(checker.isAvailable(date, "12:00", 120, [booked])).toBe(true);
    });

    it("ignores cancelled and completed orders", () => {
      const cancelled = order({ ...booked, status: "cancelled" });
      const completed = order({ ...booked, status: "completed" });

      expect(
        checker.isAvailable(date, "15:00", 60, [cancelled, completed])
      ).toBe(true);
    });

    it("ignores orders on other dates", () => {
      expect(
        checker.isAvailable("2030-06-11", "15:00", 60, [booked])
      ).toBe(true);
    });

    it("can exclude the order being rescheduled", () => {
      expect(
        checker.isAvailable(date, "15:00", 60, [booked], booked._id.toString())
      ).toBe(true);
    });

    it.each([
      ["2030-02-30", "12:00", 60],
      ["10-06-2030", "12:00", 60],
      [date, "25:00", 60],
      [date, "12:5", 60],
      [date, "12:00", 0],
    ])("is false for malformed input %p %p %p", (day, time, duration) => {
      expect(checker.isAvailable(day, time, duration, [])).toBe(false);
    });
  });

  describe("availableSlots", () => {
    it("lists every start that fits a two hour job by default", () => {
      const slots = checker.availableSlots(date, []);

      expect(slots[0]).toBe("10:00");
      expect(slots[slots.length - 1]).toBe("17:00");
      expect(slots).toHaveLength(15);
    });

    it("skips starts that would overlap a booking", () => {
      expect(checker.availableSlots(date, [booked])).toEqual([
        "10:00",
        "10:30",
        "11:00",
        "11:30",
        "12:00",
        "16:00",
        "16:30",
        "17:00",
      ]);
    });

    it("uses the requested duration", () => {
      const slots = checker.availableSlots(date, [], 60);

      expect(slots).toHaveLength(17);
      expect(slots[slots.length - 1]).toBe("18:00");
    });

    it("is empty for an invalid date", () => {
      expect(checker.availableSlots("2030-13-01", [])).toEqual([]);
    });
  });

  it("checks alignment to the slot grid", () => {
    expect(checker.isOnSlotGrid("10:30")).toBe(true);
    expect(checker.isOnSlotGrid("10:15")).toBe(false);
    expect(checker.isOnSlotGrid("09:30")).toBe(false);
  });

  it("rejects inverted working hours", () => {
    expect(
      () =>
        new AvailabilityChecker({
          workingHoursStart: "19:00",
          workingHoursEnd: "10:00",
          slotDurationMinutes: 30,
        })
    ).toThrow("Invalid working hours 19:00-10:00");
  });
});
