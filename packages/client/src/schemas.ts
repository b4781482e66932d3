/**
 * Response shapes of the reservation service API.
 * Only the fields the client reads are declared; anything else is stripped.
 */

import { z } from 'zod';

const identifierSchema = z.union([z.string().min(1), z.number()]).transform(String);

/**
 * `GET /sites/{siteId}/infos`
 */
export const siteInfoSchema = z.object({
	types: z.array(
		z.object({
			resource_type: identifierSchema,
			localized_description: z.string(),
		}),
	),
});

export type SiteInfoResponse = z.infer<typeof siteInfoSchema>;

/**
 * `GET /resources/{siteId}/available`
 */
export const availabilitySchema = z.array(
	z.object({
		resource_id: identifierSchema,
		resource_name: z.string(),
		hours: z.array(
			z.object({
				hour: z.string(),
				state: z.string(),
			}),
		),
	}),
);

export type AvailabilityResponse = z.infer<typeof availabilitySchema>;

/**
 * `POST /reserve/{resourceId}` request body.
 */
export interface ReservePayload {
	auth_type: null;
	date: string;
	email: string;
	/** HH:MM:SS */
	start_time: string;
	/** HH:MM:SS */
	end_time: string;
	note: null;
	user_firstname: string | null;
	user_lastname: string | null;
	user_phone: string | null;
	person_count: number;
}
