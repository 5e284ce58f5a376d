import type { DayOfWeek } from '@/types';
import type { TimeSlot } from '@/lib/algorithm/models';

/**
 * Minutes from midnight for a time in HH:MM format
 * @param time e.g. "09:00"
 * @returns e.g. 540
 */
export function minutesFromMidnight(time: string): number {
  const [hour, minute] = time.split(':').map(Number);

  if (isNaN(hour) || isNaN(minute)) {
    throw new Error(`Invalid time format "${time}". Expected HH:MM`);
  }

  return hour * 60 + minute;
}

/**
 * Format minutes from midnight as HH:MM (24-hour format)
 */
export function formatMinutes(totalMinutes: number): string {
  const hour = Math.floor(totalMinutes / 60);
  const minute = totalMinutes % 60;
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

export interface UnorderedTimeSlot {
  timeslotId: string;
  day: DayOfWeek;
  startTime: string;
  endTime: string;
  position?: number | null;
}

/**
 * Fill in missing positions: each weekday's slots are numbered 0, 1, 2...
 * by start time. Stored positions are kept as they are.
 * Output keeps the input order.
 */
export function assignDayPositions(slots: readonly UnorderedTimeSlot[]): TimeSlot[] {
  const derived = new Map<string, number>();
  const byDay = new Map<DayOfWeek, UnorderedTimeSlot[]>();

  for (const slot of slots) {
    const daySlots = byDay.get(slot.day) ?? [];
    daySlots.push(slot);
    byDay.set(slot.day, daySlots);
  }

  for (const daySlots of byDay.values()) {
    const ordered = [...daySlots].sort(
      (a, b) => minutesFromMidnight(a.startTime) - minutesFromMidnight(b.startTime)
    );
    ordered.forEach((slot, position) => derived.set(slot.timeslotId, position));
  }

  return slots.map((slot) => ({
    timeslotId: slot.timeslotId,
    day: slot.day,
    startTime: slot.startTime,
    endTime: slot.endTime,
    position: slot.position ?? derived.get(slot.timeslotId) ?? 0,
  }));
}
