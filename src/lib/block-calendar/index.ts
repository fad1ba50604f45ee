import { addDays, format, isValid, parse, set, startOfDay, subDays } from 'date-fns';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SLOT_MINUTES = 20;
export const SLOT_SECONDS = SLOT_MINUTES * 60;
export const SLOTS_PER_HOUR = 60 / SLOT_MINUTES;
export const SLOTS_PER_DAY = 24 * SLOTS_PER_HOUR;

const DATE_KEY_FORMAT = 'yyyy-MM-dd';

/** A slot resolved to concrete instants. Derived on demand, never stored. */
export interface BlockSlot {
  index: number;
  /** Logical day key (`yyyy-MM-dd`). */
  date: string;
  start: Date;
  end: Date;
}

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= SLOTS_PER_DAY) {
    throw new RangeError(`Block index out of range: ${index}`);
  }
}

// ---------------------------------------------------------------------------
// Date keys
// ---------------------------------------------------------------------------

export function toDateKey(date: Date): string {
  return format(date, DATE_KEY_FORMAT);
}

/** Parse a `yyyy-MM-dd` key into local midnight of that day. */
export function parseDateKey(key: string): Date {
  const parsed = parse(key, DATE_KEY_FORMAT, new Date());
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid date key: ${key}`);
  }
  return startOfDay(parsed);
}

/**
 * The logical day `now` belongs to. Before the day-start hour we are still in
 * the previous day.
 */
export function logicalDate(now: Date, dayStartHour: number): string {
  return toDateKey(now.getHours() < dayStartHour ? subDays(now, 1) : now);
}

/** Whether a slot lies in the hours before the day start (the tail of the logical day). */
export function isBeforeDayStart(index: number, dayStartHour: number): boolean {
  return index < dayStartHour * SLOTS_PER_HOUR;
}

// ---------------------------------------------------------------------------
// Slot arithmetic
// ---------------------------------------------------------------------------

/** Wall-clock slot index of `now`: minutes since local midnight / 20. */
export function indexForInstant(now: Date): number {
  return Math.floor((now.getHours() * 60 + now.getMinutes()) / SLOT_MINUTES);
}

/** Local wall-clock instant `minutesOfDay` after the midnight of `day`; 1440 is the next midnight. */
function atWallClock(day: Date, minutesOfDay: number): Date {
  return set(day, { hours: Math.floor(minutesOfDay / 60), minutes: minutesOfDay % 60, seconds: 0, milliseconds: 0 });
}

/**
 * Start and end instants of a slot on a logical day. Both are wall-clock
 * times, so a slot stays 20 minutes long on daylight-saving transition days.
 */
export function slotBounds(index: number, date: string, dayStartHour: number): { start: Date; end: Date } {
  assertIndex(index);
  const day = parseDateKey(date);
  const calendarDay = isBeforeDayStart(index, dayStartHour) ? addDays(day, 1) : day;
  return {
    start: atWallClock(calendarDay, index * SLOT_MINUTES),
    end: atWallClock(calendarDay, (index + 1) * SLOT_MINUTES),
  };
}

/** The slot containing `now`. */
export function slotForInstant(now: Date, dayStartHour: number): BlockSlot {
  const index = indexForInstant(now);
  const date = logicalDate(now, dayStartHour);
  return { index, date, ...slotBounds(index, date, dayStartHour) };
}

export function isCurrentSlot(index: number, date: string, now: Date, dayStartHour: number): boolean {
  const current = slotForInstant(now, dayStartHour);
  return current.index === index && current.date === date;
}

/**
 * Whole seconds left in a slot. 0 once it has passed, the full slot length if
 * it has not started yet.
 */
export function remainingSeconds(index: number, date: string, now: Date, dayStartHour: number): number {
  const { start, end } = slotBounds(index, date, dayStartHour);
  if (now.getTime() >= end.getTime()) return 0;
  if (now.getTime() < start.getTime()) return SLOT_SECONDS;
  return Math.floor((end.getTime() - now.getTime()) / 1000);
}

/** Day-order number (1–72) where the day-start slot is 1. */
export function displayNumber(index: number, dayStartHour: number): number {
  assertIndex(index);
  const offset = dayStartHour * SLOTS_PER_HOUR;
  return ((index - offset + SLOTS_PER_DAY) % SLOTS_PER_DAY) + 1;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatMinutes(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}`;
}

/** Wall-clock start of a slot, e.g. `"08:20"`. */
export function formatSlotTime(index: number): string {
  assertIndex(index);
  return formatMinutes(index * SLOT_MINUTES);
}

/** Wall-clock range of a slot, e.g. `"23:40–24:00"`. */
export function formatSlotRange(index: number): string {
  assertIndex(index);
  return `${formatMinutes(index * SLOT_MINUTES)}–${formatMinutes((index + 1) * SLOT_MINUTES)}`;
}
