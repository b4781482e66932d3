import { describe, expect, test } from 'vitest';
import { compressAvailabilities } from '../src/intervals.js';
import type { TimeState } from '../src/types.js';

const seat = (resourceId: string, resourceName = `Seat ${resourceId}`) => ({
	at: (time: string, state = 'available'): TimeState => ({ resourceId, resourceName, time, state }),
});

describe('compressAvailabilities', () => {
	const a = seat('a', 'Seat 1');
	const b = seat('b', 'Seat 2');

	test('returns empty map for empty input', () => {
		expect(compressAvailabilities([])).toEqual(new Map());
	});

	test('merges a gapless run into one interval', () => {
		const result = compressAvailabilities([a.at('09:00'), a.at('09:30'), a.at('10:00'), a.at('10:30')]);

		expect(result.get('a')).toEqual([
			{ resourceId: 'a', resourceName: 'Seat 1', start: '09:00', end: '10:30', length: 1.5 },
		]);
	});

	test('splits on a gap and reports zero length for a single block', () => {
		const result = compressAvailabilities([a.at('09:00'), a.at('09:30'), a.at('10:00'), a.at('11:00')]);

		expect(result.get('a')).toEqual([
			{ resourceId: 'a', resourceName: 'Seat 1', start: '09:00', end: '10:00', length: 1 },
			{ resourceId: 'a', resourceName: 'Seat 1', start: '11:00', end: '11:00', length: 0 },
		]);
	});

	test('ignores blocks that are not available', () => {
		const result = compressAvailabilities([
			a.at('09:00'),
			a.at('09:30', 'unavailable'),
			a.at('10:00'),
			a.at('10:30', 'closed'),
		]);

		expect(result.get('a')?.map((interval) => [interval.start, interval.end])).toEqual([
			['09:00', '09:00'],
			['10:00', '10:00'],
		]);
	});

	test('keeps resources with no available block as empty lists', () => {
		const result = compressAvailabilities([a.at('09:00', 'unavailable'), b.at('09:00')]);

		expect([...result.keys()]).toEqual(['a', 'b']);
		expect(result.get('a')).toEqual([]);
		expect(result.get('b')).toHaveLength(1);
	});

	test('keeps resources in order of first appearance', () => {
		const result = compressAvailabilities([b.at('14:00'), a.at('09:00'), b.at('14:30')]);

		expect([...result.keys()]).toEqual(['b', 'a']);
		expect(result.get('b')).toEqual([
			{ resourceId: 'b', resourceName: 'Seat 2', start: '14:00', end: '14:30', length: 0.5 },
		]);
	});

	test('sorts unordered blocks before merging', () => {
		const result = compressAvailabilities([a.at('10:00'), a.at('09:00'), a.at('09:30')]);

		expect(result.get('a')).toEqual([
			{ resourceId: 'a', resourceName: 'Seat 1', start: '09:00', end: '10:00', length: 1 },
		]);
	});

	test('ignores duplicate times', () => {
		const result = compressAvailabilities([a.at('09:00'), a.at('09:30'), a.at('09:30'), a.at('10:00')]);

		expect(result.get('a')).toEqual([
			{ resourceId: 'a', resourceName: 'Seat 1', start: '09:00', end: '10:00', length: 1 },
		]);
	});

	test('does not merge blocks off the half-hour step', () => {
		const result = compressAvailabilities([a.at('09:00'), a.at('09:45')]);

		expect(result.get('a')).toHaveLength(2);
	});

	test('skips blocks with malformed times', () => {
		const result = compressAvailabilities([a.at('09:00'), a.at('nine-thirty'), a.at('09:30')]);

		expect(result.get('a')).toEqual([
			{ resourceId: 'a', resourceName: 'Seat 1', start: '09:00', end: '09:30', length: 0.5 },
		]);
	});

	test('compresses a full opening day', () => {
		const states: TimeState[] = [];
		for (let minutes = 8 * 60; minutes < 19 * 60; minutes += 30) {
			const time = `${Math.floor(minutes / 60).toString().padStart(2, '0')}:${(minutes % 60).toString().padStart(2, '0')}`;
			states.push(a.at(time, time === '13:00' ? 'unavailable' : 'available'));
		}

		const result = compressAvailabilities(states);

		expect(result.get('a')).toEqual([
			{ resourceId: 'a', resourceName: 'Seat 1', start: '08:00', end: '12:30', length: 4.5 },
			{ resourceId: 'a', resourceName: 'Seat 1', start: '13:30', end: '18:30', length: 5 },
		]);
	});

	test('is deterministic for the same input', () => {
		const states = [b.at('10:00'), a.at('09:00'), a.at('09:30'), b.at('10:30'), a.at('11:00')];

		const first = compressAvailabilities(states);
		const second = compressAvailabilities(states);

		expect(second).toEqual(first);
		expect(JSON.stringify([...second])).toBe(JSON.stringify([...first]));
	});

	test('does not mutate its input', () => {
		const states = [a.at('10:00'), a.at('09:00')];
		const copy = states.map((state) => ({ ...state }));

		compressAvailabilities(states);

		expect(states).toEqual(copy);
	});
});
