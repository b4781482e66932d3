/**
 * Time primitives for working with times of day and calendar dates.
 *
 * Times of day are "HH:MM" strings on a 24-hour clock and are compared as
 * minutes since midnight. Calendar dates are "YYYY-MM-DD" strings with no zone;
 * the zone only matters when deciding what "today" is.
 */

import { addDays, differenceInCalendarDays, format, isValid, parse } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

/**
 * A local time string in HH:MM format (24-hour).
 *
 * @example "09:00", "14:30"
 */
export type LocalTime = string;

/**
 * A calendar date string in YYYY-MM-DD format.
 *
 * @example "2024-01-15"
 */
export type CalendarDate = string;

/**
 * A duration in hours. Fractional values are allowed (0.5 = 30 minutes).
 */
export type Hours = number;

/**
 * Width of one availability block reported by the reservation service.
 */
export const SLOT_GRID_MINUTES = 30;

export const MINUTES_PER_DAY = 24 * 60;

const LOCAL_TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DATE_FORMAT = 'yyyy-MM-dd';

// ============================================================================
// Times of day
// ============================================================================

/**
 * Parses an HH:MM string into minutes since midnight, or null when it is not a
 * valid time of day.
 */
export function tryParseLocalTime(time: string): number | null {
	const match = LOCAL_TIME_PATTERN.exec(time);
	if (!match) {
		return null;
	}

	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	if (hours > 23 || minutes > 59) {
		return null;
	}

	return hours * 60 + minutes;
}

/**
 * Parses an HH:MM string into minutes since midnight.
 *
 * @throws RangeError when the string is not a valid time of day
 */
export function parseLocalTime(time: string): number {
	const minutes = tryParseLocalTime(time);
	if (minutes === null) {
		throw new RangeError(`Invalid time of day: "${time}"`);
	}
	return minutes;
}

/**
 * Formats minutes since midnight as HH:MM. Midnight at the end of the day is
 * rendered as "24:00".
 */
export function formatLocalTime(minutes: number): LocalTime {
	if (!Number.isInteger(minutes) || minutes < 0 || minutes > MINUTES_PER_DAY) {
		throw new RangeError(`Minutes out of range for a time of day: ${minutes}`);
	}

	const hours = Math.floor(minutes / 60);
	const rest = minutes % 60;
	return `${hours.toString().padStart(2, '0')}:${rest.toString().padStart(2, '0')}`;
}

export function addMinutesToLocalTime(time: LocalTime, minutes: number): LocalTime {
	return formatLocalTime(parseLocalTime(time) + minutes);
}

/**
 * Signed number of minutes from `from` to `to`.
 */
export function minutesBetween(from: LocalTime, to: LocalTime): number {
	return parseLocalTime(to) - parseLocalTime(from);
}

/**
 * Whether a time of day falls on the half-hour grid (":00" or ":30").
 */
export function isOnSlotGrid(time: LocalTime): boolean {
	const minutes = tryParseLocalTime(time);
	return minutes !== null && minutes % SLOT_GRID_MINUTES === 0;
}

export function hoursToMinutes(hours: Hours): number {
	return Math.round(hours * 60);
}

// ============================================================================
// Calendar dates
// ============================================================================

function toLocalMidnight(date: CalendarDate): Date {
	return parse(date, DATE_FORMAT, new Date(0));
}

/**
 * Whether a string is a real calendar date in YYYY-MM-DD format.
 * Rejects impossible dates such as "2023-02-30".
 */
export function isCalendarDate(value: string): value is CalendarDate {
	if (!CALENDAR_DATE_PATTERN.test(value)) {
		return false;
	}
	const parsed = toLocalMidnight(value);
	return isValid(parsed) && format(parsed, DATE_FORMAT) === value;
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
	return format(addDays(toLocalMidnight(date), days), DATE_FORMAT);
}

/**
 * Number of calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function calendarDaysBetween(from: CalendarDate, to: CalendarDate): number {
	return differenceInCalendarDays(toLocalMidnight(to), toLocalMidnight(from));
}

/**
 * The calendar date of `now`, seen from an IANA timezone when one is given and
 * from the process's local zone otherwise.
 */
export function calendarDateOf(now: Date, timezone?: string): CalendarDate {
	if (timezone) {
		return formatInTimeZone(now, timezone, DATE_FORMAT);
	}
	return format(now, DATE_FORMAT);
}
