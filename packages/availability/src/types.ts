/**
 * Availability Engine Type Definitions
 *
 * Availability arrives from the reservation service as one state per resource
 * per half hour. The engine compresses those states into intervals, matches
 * desired slots against them and produces reservations.
 */

import type { CalendarDate, Hours, LocalTime, Logger } from '@seatbook/core';

export type { CalendarDate, Hours, LocalTime };

/**
 * Opaque identifier of a single bookable resource (e.g. one seat).
 */
export type ResourceId = string;

/**
 * Opaque identifier of a resource type (e.g. a reading room).
 * Resource types are the unit of preference and of availability queries.
 */
export type ResourceTypeId = string;

/**
 * Opaque identifier of a site (e.g. a library).
 */
export type SiteId = string;

/**
 * State of a half-hour block as reported by the provider.
 * Only "available" blocks can be booked; anything else is treated as taken.
 */
export type TimeStateStatus = 'available' | 'unavailable' | (string & {});

/**
 * One provider-reported half-hour block for one resource.
 *
 * @example
 * const state: TimeState = {
 *   resourceId: '1042',
 *   resourceName: 'Seat 12',
 *   time: '09:30',
 *   state: 'available'
 * };
 */
export interface TimeState {
	resourceId: ResourceId;
	resourceName: string;
	/** Start of the half-hour block */
	time: LocalTime;
	state: TimeStateStatus;
}

/**
 * A maximal run of consecutive available half-hour blocks for one resource.
 * `start` and `end` are the times of the first and last block of the run, so a
 * run made of a single block has `start === end` and a length of 0.
 */
export interface Interval {
	resourceId: ResourceId;
	resourceName: string;
	/** Time of the first block in the run */
	start: LocalTime;
	/** Time of the last block in the run */
	end: LocalTime;
	/** Hours from `start` to `end` */
	length: Hours;
}

/**
 * Compressed availability keyed by resource, in provider order.
 */
export type IntervalsByResource = Map<ResourceId, Interval[]>;

/**
 * A requested booking: a day, a desired start time and a duration.
 *
 * @example
 * const morning: DesiredSlot = { date: '2024-01-15', start: '09:00', duration: 4 };
 */
export interface DesiredSlot {
	date: CalendarDate;
	start: LocalTime;
	duration: Hours;
}

/**
 * A concrete booking decision handed to the reservation submitter.
 */
export interface Reservation {
	/** The individual resource being booked */
	resourceId: ResourceId;
	/** Name of the resource type the resource was found under */
	resourceType: string;
	/** Human-readable label of the resource */
	resourceName: string;
	date: CalendarDate;
	start: LocalTime;
	duration: Hours;
}

/**
 * A resource type as listed by the provider for a site.
 */
export interface ResourceType {
	id: ResourceTypeId;
	name: string;
}

/**
 * Which half-days to request for every day in a range.
 */
export type ReservationType = 'FULL_DAY' | 'ONLY_MORNING' | 'ONLY_AFTERNOON';

/**
 * Tolerances applied when matching a desired slot against an interval.
 */
export interface MatchTolerance {
	/** Hours discounted from an interval's length before comparing it to the desired duration */
	lengthSlackHours: Hours;
	/** Largest accepted distance between the interval start and the desired start */
	startToleranceMinutes: number;
}

/**
 * The interval chosen for a desired slot.
 */
export interface SlotMatch {
	resourceId: ResourceId;
	interval: Interval;
}

/**
 * Contact details sent along with every reservation.
 */
export interface ContactInfo {
	email: string;
	firstName?: string;
	lastName?: string;
	phone?: string;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Source of resource types and availability for a site.
 * Implementations reject with a ProviderError when a query cannot be answered;
 * an empty array is a valid answer.
 */
export interface AvailabilityProvider {
	getResourceTypes(siteId: SiteId): Promise<ResourceType[]>;
	getAvailability(siteId: SiteId, resourceTypeId: ResourceTypeId, date: CalendarDate): Promise<TimeState[]>;
}

export type SubmissionResult = { ok: true } | { ok: false; reason: string };

/**
 * Sends a reservation to the reservation service.
 * Rate limiting between submissions is the submitter's responsibility.
 */
export interface ReservationSubmitter {
	submit(reservation: Reservation, contact: ContactInfo): Promise<SubmissionResult>;
}

// ============================================================================
// Planner
// ============================================================================

export interface CreatePlannerOptions {
	provider: AvailabilityProvider;
	/** Defaults to a logger that discards everything */
	logger?: Logger;
	/** Overrides for the default 30-minute tolerances */
	tolerance?: Partial<MatchTolerance>;
}

export interface PlanInput {
	siteId: SiteId;
	/** Resource type names, most preferred first */
	preferences: string[];
	slots: DesiredSlot[];
}

export interface PlanResult {
	reservations: Reservation[];
	/** Slots no preferred resource type could host */
	unmatched: DesiredSlot[];
}

export interface Planner {
	plan(input: PlanInput): Promise<PlanResult>;
}

// ============================================================================
// Submission
// ============================================================================

export interface FailedSubmission {
	reservation: Reservation;
	reason: string;
}

export interface SubmissionReport {
	submitted: Reservation[];
	failed: FailedSubmission[];
}
