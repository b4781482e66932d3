/**
 * Thin fetch wrapper for the reservation service API.
 */

import { ProviderError } from '@seatbook/availability';
import { silentLogger } from '@seatbook/core';
import type { Logger } from '@seatbook/core';
import type { z } from 'zod';
import { createUserAgentRotation } from './headers.js';
import type { HeaderStrategy } from './headers.js';

export const DEFAULT_BASE_URL = 'https://reservation.affluences.com/api';
export const DEFAULT_TIMEOUT_MS = 5000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
	baseUrl?: string;
	/** Requests are aborted after this many milliseconds */
	timeoutMs?: number;
	headers?: HeaderStrategy;
	fetch?: FetchLike;
	logger?: Logger;
}

export interface HttpClient {
	/**
	 * GETs a JSON document and validates it.
	 *
	 * @throws ProviderError on network failure, timeout, non-2xx status, or a body
	 * that is not JSON or does not match the schema
	 */
	getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query?: Record<string, string>): Promise<T>;
	/**
	 * POSTs a JSON body and returns the raw response, whatever its status.
	 *
	 * @throws ProviderError on network failure or timeout
	 */
	postJson(path: string, body: unknown): Promise<Response>;
}

interface OutgoingRequest {
	method: 'GET' | 'POST';
	headers: Record<string, string>;
	body?: string;
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
	const {
		baseUrl = DEFAULT_BASE_URL,
		timeoutMs = DEFAULT_TIMEOUT_MS,
		headers = createUserAgentRotation(),
		fetch: fetchImpl = (input, init) => fetch(input, init),
		logger = silentLogger,
	} = options;
	const root = baseUrl.replace(/\/+$/, '');

	function buildUrl(path: string, query?: Record<string, string>): string {
		const url = new URL(`${root}${path}`);
		for (const [key, value] of Object.entries(query ?? {})) {
			url.searchParams.set(key, value);
		}
		return url.toString();
	}

	async function send(url: string, request: OutgoingRequest): Promise<Response> {
		logger.debug('Making a call to URL', { method: request.method, url });
		try {
			return await fetchImpl(url, {
				method: request.method,
				headers: { ...headers(), ...request.headers },
				body: request.body,
				signal: AbortSignal.timeout(timeoutMs),
			});
		} catch (error) {
			throw new ProviderError(`Request to ${url} failed: ${describeError(error)}`, { url, cause: error });
		}
	}

	return {
		async getJson<T>(
			path: string,
			schema: z.ZodType<T, z.ZodTypeDef, unknown>,
			query?: Record<string, string>,
		): Promise<T> {
			const url = buildUrl(path, query);
			const response = await send(url, { method: 'GET', headers: { Accept: 'application/json' } });

			if (!response.ok) {
				await response.body?.cancel();
				throw new ProviderError(`Request to ${url} failed with status ${response.status}`, {
					status: response.status,
					url,
				});
			}

			let body: unknown;
			try {
				body = await response.json();
			} catch (error) {
				throw new ProviderError(`Response from ${url} is not valid JSON`, {
					status: response.status,
					url,
					cause: error,
				});
			}

			const parsed = schema.safeParse(body);
			if (!parsed.success) {
				throw new ProviderError(`Unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
					status: response.status,
					url,
					cause: parsed.error,
				});
			}
			return parsed.data;
		},

		async postJson(path: string, body: unknown): Promise<Response> {
			return send(buildUrl(path), {
				method: 'POST',
				headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
				body: JSON.stringify(body),
			});
		},
	};
}
