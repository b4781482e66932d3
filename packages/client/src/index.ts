/**
 * seatbook client
 *
 * HTTP adapters for the reservation service, environment configuration and the
 * booking run behind the `seatbook` command.
 */

// ============================================================================
// HTTP
// ============================================================================

export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, createHttpClient } from './http.js';
export type { FetchLike, HttpClient, HttpClientOptions } from './http.js';
export { DEFAULT_USER_AGENTS, createUserAgentRotation } from './headers.js';
export type { HeaderStrategy } from './headers.js';
export { createCooldownLimiter, noRateLimit } from './rate-limit.js';
export type { CooldownLimiterOptions, RateLimiter } from './rate-limit.js';
export { availabilitySchema, siteInfoSchema } from './schemas.js';
export type { AvailabilityResponse, ReservePayload, SiteInfoResponse } from './schemas.js';

// ============================================================================
// Adapters
// ============================================================================

export { createHttpAvailabilityProvider } from './provider.js';
export { buildReservePayload, createHttpReservationSubmitter } from './submitter.js';
export type { HttpSubmitterOptions } from './submitter.js';

// ============================================================================
// Configuration and run
// ============================================================================

export { ConfigError, DEFAULT_COOLDOWN_MS, loadConfig, parseConfig } from './config.js';
export type { SeatbookConfig } from './config.js';
export { createServices, runBooking } from './run.js';
export type { BookingOutcome, BookingServices, RunBookingOptions } from './run.js';
