/**
 * Configuration Module
 *
 * Reads SEATBOOK_* environment variables (optionally from a .env file),
 * validates them and exposes a typed configuration object.
 */

import { RESERVATION_TYPES } from '@seatbook/availability';
import type { ContactInfo, GenerateSlotsOptions, ReservationType } from '@seatbook/availability';
import { LOG_LEVELS, isCalendarDate } from '@seatbook/core';
import type { LogLevel } from '@seatbook/core';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './http.js';

export const DEFAULT_COOLDOWN_MS = 5000;

export interface SeatbookConfig {
	contact: ContactInfo;
	siteId: string;
	/** Resource type names, most preferred first */
	preferences: string[];
	slots: GenerateSlotsOptions;
	baseUrl: string;
	timeoutMs: number;
	cooldownMs: number;
	logLevel: LogLevel;
	/** Plan and log, but do not submit */
	dryRun: boolean;
}

export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

/**
 * Treats unset and blank variables alike.
 */
function blankToUndefined(value: unknown): unknown {
	return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function isTimeZone(value: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: value });
		return true;
	} catch {
		return false;
	}
}

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalDate = z.preprocess(
	blankToUndefined,
	z.string().trim().refine(isCalendarDate, 'must be a YYYY-MM-DD date').optional(),
);

const reservationTypeSchema = z.custom<ReservationType>(
	(value) => RESERVATION_TYPES.some((type) => type === value),
	{ message: `must be one of ${RESERVATION_TYPES.join(', ')}` },
);

const envSchema = z.object({
	SEATBOOK_EMAIL: z.string({ required_error: 'is required' }).trim().email(),
	SEATBOOK_FIRST_NAME: optionalText,
	SEATBOOK_LAST_NAME: optionalText,
	SEATBOOK_PHONE: optionalText,
	SEATBOOK_SITE_ID: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
	SEATBOOK_PREFERENCES: z
		.string({ required_error: 'is required' })
		.transform((value) =>
			value
				.split(',')
				.map((name) => name.trim())
				.filter((name) => name.length > 0),
		)
		.pipe(z.array(z.string()).min(1, 'must name at least one resource type')),
	SEATBOOK_START_DATE: optionalDate,
	SEATBOOK_END_DATE: optionalDate,
	SEATBOOK_RESERVATION_TYPE: z.preprocess(blankToUndefined, reservationTypeSchema.default('FULL_DAY')),
	SEATBOOK_SLOT_DURATION: z.preprocess(
		blankToUndefined,
		z.coerce.number().positive().multipleOf(0.5, 'must be a whole number of half hours').default(4),
	),
	SEATBOOK_TIMEZONE: z.preprocess(
		blankToUndefined,
		z.string().trim().refine(isTimeZone, 'must be an IANA timezone').optional(),
	),
	SEATBOOK_BASE_URL: z.preprocess(blankToUndefined, z.string().trim().url().default(DEFAULT_BASE_URL)),
	SEATBOOK_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)),
	SEATBOOK_COOLDOWN_MS: z.preprocess(
		blankToUndefined,
		z.coerce.number().int().nonnegative().default(DEFAULT_COOLDOWN_MS),
	),
	SEATBOOK_LOG_LEVEL: z.preprocess(
		(value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
		z.enum(LOG_LEVELS).default('warn'),
	),
	SEATBOOK_DRY_RUN: z.preprocess(
		(value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
		z.enum(['true', 'false', '1', '0']).default('false'),
	),
});

/**
 * Validates configuration from an environment-like record.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function parseConfig(env: Record<string, string | undefined>): SeatbookConfig {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`),
		);
	}

	const values = result.data;
	return {
		contact: {
			email: values.SEATBOOK_EMAIL,
			firstName: values.SEATBOOK_FIRST_NAME,
			lastName: values.SEATBOOK_LAST_NAME,
			phone: values.SEATBOOK_PHONE,
		},
		siteId: values.SEATBOOK_SITE_ID,
		preferences: values.SEATBOOK_PREFERENCES,
		slots: {
			startDate: values.SEATBOOK_START_DATE,
			endDate: values.SEATBOOK_END_DATE,
			reservationType: values.SEATBOOK_RESERVATION_TYPE,
			slotDuration: values.SEATBOOK_SLOT_DURATION,
			timezone: values.SEATBOOK_TIMEZONE,
		},
		baseUrl: values.SEATBOOK_BASE_URL,
		timeoutMs: values.SEATBOOK_TIMEOUT_MS,
		cooldownMs: values.SEATBOOK_COOLDOWN_MS,
		logLevel: values.SEATBOOK_LOG_LEVEL,
		dryRun: values.SEATBOOK_DRY_RUN === 'true' || values.SEATBOOK_DRY_RUN === '1',
	};
}

/**
 * Loads a .env file from the working directory (set variables win) and
 * validates the resulting process environment.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): SeatbookConfig {
	dotenv.config();
	return parseConfig(env);
}
