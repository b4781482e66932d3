/**
 * First-fit matching of a desired slot against compressed availability.
 */

import { minutesBetween } from '@seatbook/core';
import type { Hours, IntervalsByResource, LocalTime, MatchTolerance, SlotMatch } from './types.js';

/**
 * Half an hour of slack on both the interval length and the start time.
 */
export const DEFAULT_MATCH_TOLERANCE: MatchTolerance = {
	lengthSlackHours: 0.5,
	startToleranceMinutes: 30,
};

export interface SlotRequest {
	start: LocalTime;
	duration: Hours;
}

export function resolveTolerance(overrides: Partial<MatchTolerance> = {}): MatchTolerance {
	return { ...DEFAULT_MATCH_TOLERANCE, ...overrides };
}

/**
 * Finds the first interval that can host the requested slot.
 *
 * Resources are visited in map order and intervals in list order, so the caller
 * decides precedence. An interval qualifies when
 * `length - lengthSlackHours >= duration` and its start lies within
 * `startToleranceMinutes` of the requested start (inclusive).
 *
 * @returns The first qualifying interval with its resource, or null
 *
 * @example
 * ```typescript
 * // A 4.5h interval starting at 09:00 hosts a 4h request for 09:00
 * findIdealSlot(intervals, { start: '09:00', duration: 4 });
 * ```
 */
export function findIdealSlot(
	intervals: IntervalsByResource,
	request: SlotRequest,
	tolerance: MatchTolerance = DEFAULT_MATCH_TOLERANCE,
): SlotMatch | null {
	for (const [resourceId, resourceIntervals] of intervals) {
		for (const interval of resourceIntervals) {
			if (interval.length - tolerance.lengthSlackHours < request.duration) {
				continue;
			}

			const offset = Math.abs(minutesBetween(request.start, interval.start));
			if (offset > tolerance.startToleranceMinutes) {
				continue;
			}

			return { resourceId, interval };
		}
	}

	return null;
}
