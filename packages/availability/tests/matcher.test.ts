import { describe, expect, test } from 'vitest';
import { DEFAULT_MATCH_TOLERANCE, findIdealSlot, resolveTolerance } from '../src/matcher.js';
import type { Interval, IntervalsByResource } from '../src/types.js';

const interval = (resourceId: string, start: string, end: string, length: number): Interval => ({
	resourceId,
	resourceName: `Seat ${resourceId}`,
	start,
	end,
	length,
});

const byResource = (...entries: [string, Interval[]][]): IntervalsByResource => new Map(entries);

describe('findIdealSlot', () => {
	describe('length tolerance', () => {
		test('accepts an interval half an hour longer than requested', () => {
			const candidate = interval('a', '09:00', '13:30', 4.5);
			const match = findIdealSlot(byResource(['a', [candidate]]), { start: '09:00', duration: 4 });

			expect(match).toEqual({ resourceId: 'a', interval: candidate });
		});

		test('rejects an interval exactly as long as requested', () => {
			const intervals = byResource(['a', [interval('a', '09:00', '13:00', 4)]]);

			expect(findIdealSlot(intervals, { start: '09:00', duration: 4 })).toBeNull();
		});

		test('accepts much longer intervals', () => {
			const intervals = byResource(['a', [interval('a', '08:30', '18:00', 9.5)]]);

			expect(findIdealSlot(intervals, { start: '09:00', duration: 4 })?.resourceId).toBe('a');
		});
	});

	describe('start tolerance', () => {
		const request = { start: '09:00', duration: 1 };

		test('accepts a start exactly 30 minutes late', () => {
			const intervals = byResource(['a', [interval('a', '09:30', '12:00', 2.5)]]);

			expect(findIdealSlot(intervals, request)).not.toBeNull();
		});

		test('accepts a start exactly 30 minutes early', () => {
			const intervals = byResource(['a', [interval('a', '08:30', '12:00', 3.5)]]);

			expect(findIdealSlot(intervals, request)).not.toBeNull();
		});

		test('rejects a start 31 minutes late', () => {
			const intervals = byResource(['a', [interval('a', '09:31', '12:01', 2.5)]]);

			expect(findIdealSlot(intervals, request)).toBeNull();
		});

		test('rejects a long interval that starts an hour early', () => {
			const intervals = byResource(['a', [interval('a', '08:00', '18:00', 10)]]);

			expect(findIdealSlot(intervals, request)).toBeNull();
		});
	});

	describe('first fit', () => {
		test('prefers the first resource in map order over a better later one', () => {
			const first = interval('a', '09:30', '14:00', 4.5);
			const better = interval('b', '09:00', '18:00', 9);
			const match = findIdealSlot(byResource(['a', [first]], ['b', [better]]), {
				start: '09:00',
				duration: 4,
			});

			expect(match).toEqual({ resourceId: 'a', interval: first });
		});

		test('walks intervals in list order within a resource', () => {
			const tooShort = interval('a', '09:00', '10:00', 1);
			const fits = interval('a', '09:30', '15:00', 5.5);
			const match = findIdealSlot(byResource(['a', [tooShort, fits]]), { start: '09:00', duration: 4 });

			expect(match?.interval).toBe(fits);
		});

		test('falls through to later resources', () => {
			const fits = interval('b', '14:00', '18:30', 4.5);
			const match = findIdealSlot(
				byResource(['a', []], ['b', [interval('b', '09:00', '13:30', 4.5), fits]]),
				{ start: '14:00', duration: 4 },
			);

			expect(match).toEqual({ resourceId: 'b', interval: fits });
		});

		test('returns null when nothing qualifies', () => {
			expect(findIdealSlot(new Map(), { start: '09:00', duration: 4 })).toBeNull();
		});
	});

	describe('tolerance overrides', () => {
		test('defaults to half an hour on both axes', () => {
			expect(DEFAULT_MATCH_TOLERANCE).toEqual({ lengthSlackHours: 0.5, startToleranceMinutes: 30 });
			expect(resolveTolerance()).toEqual(DEFAULT_MATCH_TOLERANCE);
		});

		test('applies a wider start tolerance', () => {
			const intervals = byResource(['a', [interval('a', '10:00', '15:00', 5)]]);
			const tolerance = resolveTolerance({ startToleranceMinutes: 60 });

			expect(tolerance).toEqual({ lengthSlackHours: 0.5, startToleranceMinutes: 60 });
			expect(findIdealSlot(intervals, { start: '09:00', duration: 4 }, tolerance)).not.toBeNull();
		});

		test('applies a zero length slack', () => {
			const intervals = byResource(['a', [interval('a', '09:00', '13:00', 4)]]);
			const tolerance = resolveTolerance({ lengthSlackHours: 0 });

			expect(findIdealSlot(intervals, { start: '09:00', duration: 4 }, tolerance)).not.toBeNull();
		});
	});
});
