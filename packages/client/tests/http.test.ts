import { describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { ProviderError } from '@seatbook/availability';
import { createHttpClient } from '../src/http.js';
import type { FetchLike } from '../src/http.js';

const jsonResponse = (body: unknown, status = 200) =>
	new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

function setup(respond: () => Response) {
	const fetch = vi.fn<FetchLike>(async () => respond());
	const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
	const client = createHttpClient({
		baseUrl: 'https://api.test/api/',
		headers: () => ({ 'User-Agent': 'test-agent' }),
		fetch,
		logger,
	});
	return { client, fetch, logger };
}

const itemSchema = z.object({ name: z.string() });

describe('createHttpClient', () => {
	describe('getJson', () => {
		test('builds the URL from the base, path and query', async () => {
			const { client, fetch } = setup(() => jsonResponse({ name: 'Reading room' }));

			await client.getJson('/resources/site-1/available', itemSchema, {
				date: '2024-01-15',
				type: 't1',
				capacity: '1',
			});

			expect(fetch).toHaveBeenCalledTimes(1);
			expect(fetch.mock.calls[0][0]).toBe(
				'https://api.test/api/resources/site-1/available?date=2024-01-15&type=t1&capacity=1',
			);
		});

		test('sends strategy headers with every request', async () => {
			const { client, fetch } = setup(() => jsonResponse({ name: 'Reading room' }));

			await client.getJson('/sites/site-1/infos', itemSchema);

			const init = fetch.mock.calls[0][1];
			expect(init?.method).toBe('GET');
			expect(init?.headers).toEqual({ 'User-Agent': 'test-agent', Accept: 'application/json' });
			expect(init?.signal).toBeInstanceOf(AbortSignal);
		});

		test('returns the validated body', async () => {
			const { client } = setup(() => jsonResponse({ name: 'Reading room', extra: true }));

			await expect(client.getJson('/sites/site-1/infos', itemSchema)).resolves.toEqual({ name: 'Reading room' });
		});

		test('logs each call at debug level', async () => {
			const { client, logger } = setup(() => jsonResponse({ name: 'Reading room' }));

			await client.getJson('/sites/site-1/infos', itemSchema);

			expect(logger.debug).toHaveBeenCalledWith('Making a call to URL', {
				method: 'GET',
				url: 'https://api.test/api/sites/site-1/infos',
			});
		});

		test('rejects a non-2xx status with a ProviderError', async () => {
			const { client } = setup(() => new Response('boom', { status: 500 }));

			const error = await client.getJson('/sites/site-1/infos', itemSchema).catch((reason: unknown) => reason);

			expect(error).toBeInstanceOf(ProviderError);
			expect(error).toMatchObject({
				message: 'Request to https://api.test/api/sites/site-1/infos failed with status 500',
				status: 500,
				url: 'https://api.test/api/sites/site-1/infos',
			});
		});

		test('releases the body of a failed response', async () => {
			const response = new Response('boom', { status: 503 });
			const { client } = setup(() => response);

			await expect(client.getJson('/sites/site-1/infos', itemSchema)).rejects.toBeInstanceOf(ProviderError);
			expect(response.bodyUsed).toBe(true);
		});

		test('rejects a body that is not JSON', async () => {
			const { client } = setup(() => new Response('<html></html>', { status: 200 }));

			await expect(client.getJson('/sites/site-1/infos', itemSchema)).rejects.toThrow(
				'Response from https://api.test/api/sites/site-1/infos is not valid JSON',
			);
		});

		test('rejects a body that does not match the schema', async () => {
			const { client } = setup(() => jsonResponse({ name: 42 }));

			await expect(client.getJson('/sites/site-1/infos', itemSchema)).rejects.toThrow(
				'Unexpected response from https://api.test/api/sites/site-1/infos: Expected string, received number',
			);
		});

		test('wraps network failures in a ProviderError', async () => {
			const fetch = vi.fn<FetchLike>(async () => {
				throw new TypeError('fetch failed');
			});
			const client = createHttpClient({ baseUrl: 'https://api.test/api', fetch });

			const error = await client.getJson('/sites/site-1/infos', itemSchema).catch((reason: unknown) => reason);

			expect(error).toBeInstanceOf(ProviderError);
			expect(error).toMatchObject({
				message: 'Request to https://api.test/api/sites/site-1/infos failed: fetch failed',
			});
		});
	});

	describe('postJson', () => {
		test('posts a JSON body', async () => {
			const { client, fetch } = setup(() => jsonResponse({}));

			await client.postJson('/reserve/101', { date: '2024-01-15' });

			const [url, init] = fetch.mock.calls[0];
			expect(url).toBe('https://api.test/api/reserve/101');
			expect(init?.method).toBe('POST');
			expect(init?.body).toBe('{"date":"2024-01-15"}');
			expect(init?.headers).toEqual({
				'User-Agent': 'test-agent',
				'Content-Type': 'application/json',
				Accept: 'application/json',
			});
		});

		test('returns unsuccessful responses without throwing', async () => {
			const { client } = setup(() => new Response('Seat already booked', { status: 409 }));

			const response = await client.postJson('/reserve/101', {});

			expect(response.status).toBe(409);
			await expect(response.text()).resolves.toBe('Seat already booked');
		});
	});
});
