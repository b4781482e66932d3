/**
 * Availability provider backed by the reservation service API.
 */

import type { AvailabilityProvider, ResourceType, TimeState } from '@seatbook/availability';
import type { HttpClient } from './http.js';
import { availabilitySchema, siteInfoSchema } from './schemas.js';

/**
 * Create a provider that lists resource types from the site info endpoint and
 * reads single-seat availability per resource type and day.
 */
export function createHttpAvailabilityProvider(client: HttpClient): AvailabilityProvider {
	return {
		async getResourceTypes(siteId): Promise<ResourceType[]> {
			const info = await client.getJson(`/sites/${encodeURIComponent(siteId)}/infos`, siteInfoSchema);

			return info.types.map((type) => ({
				id: type.resource_type,
				name: type.localized_description,
			}));
		},

		async getAvailability(siteId, resourceTypeId, date): Promise<TimeState[]> {
			const resources = await client.getJson(
				`/resources/${encodeURIComponent(siteId)}/available`,
				availabilitySchema,
				{ date, type: resourceTypeId, capacity: '1' },
			);

			return resources.flatMap((resource) =>
				resource.hours.map((block) => ({
					resourceId: resource.resource_id,
					resourceName: resource.resource_name,
					time: block.hour,
					state: block.state,
				})),
			);
		},
	};
}
