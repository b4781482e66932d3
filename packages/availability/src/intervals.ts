/**
 * Compression of half-hour availability into contiguous intervals.
 * An interval spans the times of its first and last block; its length is the
 * number of hours between them.
 */

import { SLOT_GRID_MINUTES, formatLocalTime, tryParseLocalTime } from '@seatbook/core';
import type { Interval, IntervalsByResource, ResourceId, TimeState } from './types.js';

interface ResourceBlocks {
	resourceName: string;
	/** Minutes since midnight of every available block */
	minutes: number[];
}

/**
 * Groups states by resource in order of first appearance, keeping only the
 * available blocks with a parseable time.
 */
function groupAvailableBlocks(states: TimeState[]): Map<ResourceId, ResourceBlocks> {
	const groups = new Map<ResourceId, ResourceBlocks>();

	for (const state of states) {
		let group = groups.get(state.resourceId);
		if (!group) {
			group = { resourceName: state.resourceName, minutes: [] };
			groups.set(state.resourceId, group);
		}

		if (state.state !== 'available') {
			continue;
		}

		const minutes = tryParseLocalTime(state.time);
		if (minutes !== null) {
			group.minutes.push(minutes);
		}
	}

	return groups;
}

/**
 * Splits sorted block times into runs where each block starts exactly one
 * grid step after the previous one.
 */
function splitIntoRuns(minutes: number[]): number[][] {
	const sorted = [...minutes].sort((a, b) => a - b);
	const runs: number[][] = [];
	let current: number[] = [];

	for (const time of sorted) {
		const previous = current[current.length - 1];

		if (previous === time) {
			continue;
		}

		if (previous !== undefined && time === previous + SLOT_GRID_MINUTES) {
			current.push(time);
		} else {
			current = [time];
			runs.push(current);
		}
	}

	return runs;
}

function toInterval(resourceId: ResourceId, resourceName: string, run: number[]): Interval {
	const first = run[0];
	const last = run[run.length - 1];

	return {
		resourceId,
		resourceName,
		start: formatLocalTime(first),
		end: formatLocalTime(last),
		length: (last - first) / 60,
	};
}

/**
 * Compresses raw availability into maximal runs of available blocks per resource.
 *
 * Every resource that appears in the input gets an entry, in order of first
 * appearance. Resources with no available block map to an empty list.
 * Input order within a resource does not matter; duplicate times are ignored.
 *
 * @param states - Half-hour states for one or more resources
 * @returns Intervals per resource, each list sorted by start time
 *
 * @example
 * ```typescript
 * const intervals = compressAvailabilities([
 *   { resourceId: 'a', resourceName: 'Seat 1', time: '09:00', state: 'available' },
 *   { resourceId: 'a', resourceName: 'Seat 1', time: '09:30', state: 'available' },
 *   { resourceId: 'a', resourceName: 'Seat 1', time: '10:00', state: 'available' },
 *   { resourceId: 'a', resourceName: 'Seat 1', time: '11:00', state: 'available' },
 * ]);
 * // Map { 'a' => [
 * //   { start: '09:00', end: '10:00', length: 1, ... },
 * //   { start: '11:00', end: '11:00', length: 0, ... },
 * // ] }
 * ```
 */
export function compressAvailabilities(states: TimeState[]): IntervalsByResource {
	const result: IntervalsByResource = new Map();

	for (const [resourceId, group] of groupAvailableBlocks(states)) {
		const runs = splitIntoRuns(group.minutes);
		result.set(
			resourceId,
			runs.map((run) => toInterval(resourceId, group.resourceName, run)),
		);
	}

	return result;
}
