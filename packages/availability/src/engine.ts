/**
 * Allocation planner with adapter-based data loading.
 */

import { silentLogger } from '@seatbook/core';
import type { Logger } from '@seatbook/core';
import { isProviderError } from './errors.js';
import { compressAvailabilities } from './intervals.js';
import { findIdealSlot, resolveTolerance } from './matcher.js';
import { createDesiredSlot, createReservation, describeSlot } from './records.js';
import type {
	AvailabilityProvider,
	CreatePlannerOptions,
	DesiredSlot,
	IntervalsByResource,
	MatchTolerance,
	PlanInput,
	PlanResult,
	Planner,
	Reservation,
	ResourceType,
	SiteId,
} from './types.js';

/**
 * Resolves preference names to the site's resource types, keeping preference
 * order. Every type carrying a preferred name is kept once.
 */
function resolvePreferences(
	preferences: string[],
	resourceTypes: ResourceType[],
	logger: Logger,
): ResourceType[] {
	const resolved: ResourceType[] = [];
	const seen = new Set<string>();

	for (const name of preferences) {
		const matching = resourceTypes.filter((type) => type.name === name);
		if (matching.length === 0) {
			logger.debug('No resource type matches preference', { preference: name });
			continue;
		}

		for (const type of matching) {
			if (!seen.has(type.id)) {
				seen.add(type.id);
				resolved.push(type);
			}
		}
	}

	return resolved;
}

async function loadResourceTypes(
	provider: AvailabilityProvider,
	siteId: SiteId,
	logger: Logger,
): Promise<ResourceType[]> {
	try {
		return await provider.getResourceTypes(siteId);
	} catch (error) {
		if (!isProviderError(error)) {
			throw error;
		}
		logger.error('Could not list resource types, no slot can be matched', {
			siteId,
			error: error.message,
		});
		return [];
	}
}

/**
 * Loads and compresses availability for one resource type on one day.
 * A failed query counts as no availability.
 */
async function loadIntervals(
	provider: AvailabilityProvider,
	siteId: SiteId,
	resourceType: ResourceType,
	slot: DesiredSlot,
	logger: Logger,
): Promise<IntervalsByResource> {
	logger.debug('Getting available slots', { resourceType: resourceType.name, date: slot.date });

	try {
		const states = await provider.getAvailability(siteId, resourceType.id, slot.date);
		return compressAvailabilities(states);
	} catch (error) {
		if (!isProviderError(error)) {
			throw error;
		}
		logger.warn('Availability query failed, skipping', {
			resourceType: resourceType.name,
			date: slot.date,
			error: error.message,
		});
		return new Map();
	}
}

/**
 * Create an allocation planner with the given provider.
 */
export function createPlanner(options: CreatePlannerOptions): Planner {
	const { provider, logger = silentLogger } = options;
	const tolerance: MatchTolerance = resolveTolerance(options.tolerance);

	/**
	 * Matches desired slots to resources, trying resource types in preference
	 * order. A slot claimed by a resource type is never offered to a later one.
	 * Queries run one at a time.
	 *
	 * @throws ValidationError when a desired slot is invalid
	 */
	async function plan(input: PlanInput): Promise<PlanResult> {
		const { siteId, preferences } = input;
		let pending: DesiredSlot[] = input.slots.map((slot) => createDesiredSlot(slot));

		const resourceTypes = resolvePreferences(
			preferences,
			await loadResourceTypes(provider, siteId, logger),
			logger,
		);

		const reservations: Reservation[] = [];

		for (const resourceType of resourceTypes) {
			if (pending.length === 0) {
				break;
			}

			const claimed = new Set<DesiredSlot>();

			for (const slot of pending) {
				const intervals = await loadIntervals(provider, siteId, resourceType, slot, logger);
				const match = findIdealSlot(intervals, slot, tolerance);
				if (!match) {
					continue;
				}

				logger.debug('Found a slot', {
					resourceId: match.resourceId,
					interval: `${match.interval.start}-${match.interval.end}`,
					length: match.interval.length,
				});

				reservations.push(
					createReservation({
						resourceId: match.resourceId,
						resourceType: resourceType.name,
						resourceName: match.interval.resourceName,
						date: slot.date,
						start: slot.start,
						duration: slot.duration,
					}),
				);
				claimed.add(slot);
			}

			pending = pending.filter((slot) => !claimed.has(slot));
		}

		if (pending.length > 0) {
			logger.warn('Could not find all slots', {
				missing: pending.map(describeSlot),
			});
		}
		logger.debug('Planned reservations', { count: reservations.length });

		return { reservations, unmatched: pending };
	}

	return { plan };
}
