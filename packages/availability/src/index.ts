/**
 * Availability Engine
 *
 * Turns half-hour availability reported by a reservation service into
 * contiguous intervals, matches desired slots against them in resource type
 * preference order and submits the resulting reservations.
 *
 * @packageDocumentation
 */

// Interval compression
export { compressAvailabilities } from './intervals.js';
// Slot matching
export { DEFAULT_MATCH_TOLERANCE, findIdealSlot, resolveTolerance } from './matcher.js';
export type { SlotRequest } from './matcher.js';
// Slot generation
export {
	AFTERNOON_START,
	BOOKING_HORIZON_DAYS,
	MORNING_START,
	RESERVATION_TYPES,
	generateSlots,
} from './slots.js';
export type { GenerateSlotsOptions } from './slots.js';
// Adapter-based planner
export { createPlanner } from './engine.js';
// Submission
export { reservationEnd, submitReservations } from './submissions.js';
// Records and errors
export { createDesiredSlot, createReservation, describeSlot } from './records.js';
export { ProviderError, ValidationError, isProviderError } from './errors.js';

// All types
export type {
	AvailabilityProvider,
	CalendarDate,
	ContactInfo,
	CreatePlannerOptions,
	DesiredSlot,
	FailedSubmission,
	Hours,
	Interval,
	IntervalsByResource,
	LocalTime,
	MatchTolerance,
	PlanInput,
	PlanResult,
	Planner,
	Reservation,
	ReservationSubmitter,
	ReservationType,
	ResourceId,
	ResourceType,
	ResourceTypeId,
	SiteId,
	SlotMatch,
	SubmissionReport,
	SubmissionResult,
	TimeState,
	TimeStateStatus,
} from './types.js';
