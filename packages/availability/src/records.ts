/**
 * Validating constructors for the records the engine exchanges.
 */

import {
	MINUTES_PER_DAY,
	hoursToMinutes,
	isCalendarDate,
	isOnSlotGrid,
	tryParseLocalTime,
} from '@seatbook/core';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { DesiredSlot, Reservation } from './types.js';

const calendarDateSchema = z.string().refine(isCalendarDate, {
	message: 'must be a YYYY-MM-DD calendar date',
});

const gridTimeSchema = z.string().refine(isOnSlotGrid, {
	message: 'must be an HH:MM time on the half-hour grid',
});

export const durationSchema = z
	.number()
	.finite()
	.nonnegative()
	.multipleOf(0.5, { message: 'must be a whole number of half hours' });

function endsByMidnight(value: { start: string; duration: number }, ctx: z.RefinementCtx): void {
	const start = tryParseLocalTime(value.start);
	if (start === null) {
		return;
	}
	if (start + hoursToMinutes(value.duration) > MINUTES_PER_DAY) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ['duration'],
			message: 'must end by midnight',
		});
	}
}

const desiredSlotSchema = z
	.object({
		date: calendarDateSchema,
		start: gridTimeSchema,
		duration: durationSchema,
	})
	.superRefine(endsByMidnight);

const reservationSchema = z
	.object({
		resourceId: z.string().min(1),
		resourceType: z.string().min(1),
		resourceName: z.string(),
		date: calendarDateSchema,
		start: gridTimeSchema,
		duration: durationSchema,
	})
	.superRefine(endsByMidnight);

export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message,
	);
}

/**
 * Validates and freezes a desired slot.
 *
 * @throws ValidationError when the date, start or duration is invalid
 */
export function createDesiredSlot(input: DesiredSlot): DesiredSlot {
	const result = desiredSlotSchema.safeParse(input);
	if (!result.success) {
		throw new ValidationError('Invalid desired slot', formatIssues(result.error));
	}
	return Object.freeze(result.data);
}

/**
 * Validates and freezes a reservation.
 *
 * @throws ValidationError when any field is invalid
 */
export function createReservation(input: Reservation): Reservation {
	const result = reservationSchema.safeParse(input);
	if (!result.success) {
		throw new ValidationError('Invalid reservation', formatIssues(result.error));
	}
	return Object.freeze(result.data);
}

/**
 * Short human-readable form of a slot, e.g. "2024-01-15 09:00 (4h)".
 */
export function describeSlot(slot: DesiredSlot): string {
	return `${slot.date} ${slot.start} (${slot.duration}h)`;
}
