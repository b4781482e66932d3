/**
 * One booking pass: generate slots, plan against live availability and
 * submit (or, in dry-run mode, only log) the planned reservations.
 */

import { createPlanner, generateSlots, reservationEnd, submitReservations } from '@seatbook/availability';
import type {
	AvailabilityProvider,
	PlanResult,
	ReservationSubmitter,
	SubmissionReport,
} from '@seatbook/availability';
import type { Logger } from '@seatbook/core';
import type { SeatbookConfig } from './config.js';
import { createUserAgentRotation } from './headers.js';
import { createHttpClient } from './http.js';
import type { FetchLike } from './http.js';
import { createHttpAvailabilityProvider } from './provider.js';
import { createCooldownLimiter } from './rate-limit.js';
import { createHttpReservationSubmitter } from './submitter.js';

export interface BookingServices {
	provider: AvailabilityProvider;
	submitter: ReservationSubmitter;
}

export interface RunBookingOptions extends BookingServices {
	logger: Logger;
	/** Reference instant for "today"; defaults to the current time */
	now?: Date;
}

export interface BookingOutcome {
	plan: PlanResult;
	/** Null in dry-run mode */
	submission: SubmissionReport | null;
}

/**
 * Wires the HTTP provider and submitter from configuration. Both share one
 * client; only submissions are spaced by the cooldown.
 */
export function createServices(config: SeatbookConfig, logger: Logger, fetch?: FetchLike): BookingServices {
	const client = createHttpClient({
		baseUrl: config.baseUrl,
		timeoutMs: config.timeoutMs,
		headers: createUserAgentRotation(),
		fetch,
		logger,
	});

	return {
		provider: createHttpAvailabilityProvider(client),
		submitter: createHttpReservationSubmitter({
			client,
			limiter: createCooldownLimiter({ cooldownMs: config.cooldownMs }),
		}),
	};
}

export async function runBooking(config: SeatbookConfig, options: RunBookingOptions): Promise<BookingOutcome> {
	const { provider, submitter, logger, now } = options;

	const slots = generateSlots(config.slots, now);
	logger.info('Generated desired slots', { count: slots.length });

	const planner = createPlanner({ provider, logger });
	const plan = await planner.plan({
		siteId: config.siteId,
		preferences: config.preferences,
		slots,
	});

	let submission: SubmissionReport | null = null;
	if (config.dryRun) {
		for (const reservation of plan.reservations) {
			logger.info('Would reserve', {
				resourceType: reservation.resourceType,
				resourceName: reservation.resourceName,
				date: reservation.date,
				start: reservation.start,
				end: reservationEnd(reservation),
			});
		}
	} else {
		submission = await submitReservations(submitter, plan.reservations, config.contact, logger);
	}

	logger.info('Done', {
		planned: plan.reservations.length,
		unmatched: plan.unmatched.length,
		failed: submission?.failed.length ?? 0,
	});
	return { plan, submission };
}
