/**
 * Best-effort submission of planned reservations.
 */

import { addMinutesToLocalTime, hoursToMinutes, silentLogger } from '@seatbook/core';
import type { Logger } from '@seatbook/core';
import type {
	ContactInfo,
	FailedSubmission,
	Reservation,
	ReservationSubmitter,
	SubmissionReport,
} from './types.js';

/**
 * End time of a reservation as HH:MM.
 */
export function reservationEnd(reservation: Reservation): string {
	return addMinutesToLocalTime(reservation.start, hoursToMinutes(reservation.duration));
}

function describeReservation(reservation: Reservation) {
	return {
		resourceType: reservation.resourceType,
		resourceName: reservation.resourceName,
		resourceId: reservation.resourceId,
		date: reservation.date,
		start: reservation.start,
		end: reservationEnd(reservation),
		duration: reservation.duration,
	};
}

/**
 * Submits reservations one after another.
 *
 * A rejected or failed submission is logged and recorded in the report; the
 * remaining reservations are still submitted. There is no rollback.
 */
export async function submitReservations(
	submitter: ReservationSubmitter,
	reservations: Reservation[],
	contact: ContactInfo,
	logger: Logger = silentLogger,
): Promise<SubmissionReport> {
	const submitted: Reservation[] = [];
	const failed: FailedSubmission[] = [];

	for (const reservation of reservations) {
		logger.info('Making a reservation', describeReservation(reservation));

		let reason: string | null = null;
		try {
			const result = await submitter.submit(reservation, contact);
			if (!result.ok) {
				reason = result.reason;
			}
		} catch (error) {
			reason = error instanceof Error ? error.message : String(error);
		}

		if (reason === null) {
			logger.debug('Reservation successful', { resourceId: reservation.resourceId });
			submitted.push(reservation);
		} else {
			logger.error(`Reservation failed: ${reason}`, describeReservation(reservation));
			failed.push({ reservation, reason });
		}
	}

	return { submitted, failed };
}
