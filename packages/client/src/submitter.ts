/**
 * Reservation submitter backed by the reservation service API.
 */

import { reservationEnd } from '@seatbook/availability';
import type {
	ContactInfo,
	Reservation,
	ReservationSubmitter,
	SubmissionResult,
} from '@seatbook/availability';
import type { HttpClient } from './http.js';
import { noRateLimit } from './rate-limit.js';
import type { RateLimiter } from './rate-limit.js';
import type { ReservePayload } from './schemas.js';

export interface HttpSubmitterOptions {
	client: HttpClient;
	/** Spacing between submissions; defaults to none */
	limiter?: RateLimiter;
}

export function buildReservePayload(reservation: Reservation, contact: ContactInfo): ReservePayload {
	return {
		auth_type: null,
		date: reservation.date,
		email: contact.email,
		start_time: `${reservation.start}:00`,
		end_time: `${reservationEnd(reservation)}:00`,
		note: null,
		user_firstname: contact.firstName ?? null,
		user_lastname: contact.lastName ?? null,
		user_phone: contact.phone ?? null,
		person_count: 1,
	};
}

/**
 * Create a submitter that POSTs each reservation to the reserve endpoint.
 * It never throws: transport failures and rejected reservations come back as
 * `{ ok: false, reason }`.
 */
export function createHttpReservationSubmitter(options: HttpSubmitterOptions): ReservationSubmitter {
	const { client, limiter = noRateLimit } = options;

	return {
		async submit(reservation, contact): Promise<SubmissionResult> {
			await limiter.wait();

			try {
				const response = await client.postJson(
					`/reserve/${encodeURIComponent(reservation.resourceId)}`,
					buildReservePayload(reservation, contact),
				);
				if (response.ok) {
					await response.body?.cancel();
					return { ok: true };
				}

				const body = (await response.text()).trim();
				return { ok: false, reason: body.length > 0 ? body : `HTTP ${response.status}` };
			} catch (error) {
				return { ok: false, reason: error instanceof Error ? error.message : String(error) };
			}
		},
	};
}
