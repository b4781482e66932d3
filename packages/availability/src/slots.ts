/**
 * Generation of desired slots for a date range.
 */

import {
	addCalendarDays,
	calendarDateOf,
	calendarDaysBetween,
	isCalendarDate,
} from '@seatbook/core';
import { ValidationError } from './errors.js';
import { createDesiredSlot } from './records.js';
import type { CalendarDate, DesiredSlot, Hours, LocalTime, ReservationType } from './types.js';

/**
 * How many days ahead the reservation service accepts bookings.
 */
export const BOOKING_HORIZON_DAYS = 7;

export const MORNING_START: LocalTime = '09:00';
export const AFTERNOON_START: LocalTime = '14:00';

export const RESERVATION_TYPES: readonly ReservationType[] = ['FULL_DAY', 'ONLY_MORNING', 'ONLY_AFTERNOON'];

export interface GenerateSlotsOptions {
	/** First day to request; defaults to today */
	startDate?: CalendarDate;
	/** Last day to request (inclusive); defaults to and is clamped at today + 7 days */
	endDate?: CalendarDate;
	/** Defaults to FULL_DAY */
	reservationType?: ReservationType;
	/** Hours per slot; defaults to 4 */
	slotDuration?: Hours;
	/** IANA timezone deciding what "today" is; defaults to the process's zone */
	timezone?: string;
}

function includesMorning(type: ReservationType): boolean {
	return type === 'FULL_DAY' || type === 'ONLY_MORNING';
}

function includesAfternoon(type: ReservationType): boolean {
	return type === 'FULL_DAY' || type === 'ONLY_AFTERNOON';
}

function assertCalendarDate(value: string, field: string): void {
	if (!isCalendarDate(value)) {
		throw new ValidationError('Invalid slot range', [`${field} must be a YYYY-MM-DD calendar date`]);
	}
}

/**
 * Generates the desired slots for every day from `startDate` to `endDate`.
 *
 * The end date is clamped to the booking horizon (today + 7 days). Each day
 * gets a 09:00 slot for FULL_DAY and ONLY_MORNING, then a 14:00 slot for
 * FULL_DAY and ONLY_AFTERNOON. The result is empty when the start date lies
 * past the clamped end.
 *
 * @param options - Range, half-day policy and slot length
 * @param now - Reference time for "today" (defaults to new Date())
 * @returns Slots in chronological order, morning before afternoon
 *
 * @example
 * ```typescript
 * generateSlots(
 *   { startDate: '2024-01-15', endDate: '2024-01-16', reservationType: 'ONLY_MORNING', slotDuration: 3 },
 *   new Date('2024-01-15T08:00:00Z'),
 * );
 * // [
 * //   { date: '2024-01-15', start: '09:00', duration: 3 },
 * //   { date: '2024-01-16', start: '09:00', duration: 3 },
 * // ]
 * ```
 */
export function generateSlots(options: GenerateSlotsOptions = {}, now?: Date): DesiredSlot[] {
	const currentTime = now ?? new Date();
	const today = calendarDateOf(currentTime, options.timezone);
	const horizon = addCalendarDays(today, BOOKING_HORIZON_DAYS);

	const {
		startDate = today,
		endDate = horizon,
		reservationType = 'FULL_DAY',
		slotDuration = 4,
	} = options;

	assertCalendarDate(startDate, 'startDate');
	assertCalendarDate(endDate, 'endDate');

	const lastDate = endDate > horizon ? horizon : endDate;
	const dayCount = calendarDaysBetween(startDate, lastDate) + 1;

	const slots: DesiredSlot[] = [];
	for (let offset = 0; offset < dayCount; offset++) {
		const date = addCalendarDays(startDate, offset);

		if (includesMorning(reservationType)) {
			slots.push(createDesiredSlot({ date, start: MORNING_START, duration: slotDuration }));
		}

		if (includesAfternoon(reservationType)) {
			slots.push(createDesiredSlot({ date, start: AFTERNOON_START, duration: slotDuration }));
		}
	}

	return slots;
}
