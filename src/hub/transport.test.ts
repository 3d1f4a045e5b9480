import { afterEach, describe, expect, it, vi } from 'vitest';

import { TransportError } from './errors.js';
import { FetchTransport } from './transport.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function stubFetch(impl: (...args: FetchArgs) => Promise<Response>) {
	const fetchMock = vi.fn(impl);
	vi.stubGlobal('fetch', fetchMock);
	return fetchMock;
}

describe('FetchTransport', () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it('posts the form body to the base URL and returns the reply text', async () => {
		const fetchMock = stubFetch(async () => new Response('{"reply":{}}', { status: 200 }));
		const transport = new FetchTransport({ baseUrl: 'http://hub.test/', timeoutMs: 1_000 });

		await expect(transport.post('/cgi/json-req', 'req=%7B%7D')).resolves.toBe('{"reply":{}}');

		expect(fetchMock).toHaveBeenCalledTimes(1);
		const [url, init] = fetchMock.mock.calls[0];
		expect(url).toBe('http://hub.test/cgi/json-req');
		expect(init?.method).toBe('POST');
		expect(init?.body).toBe('req=%7B%7D');
	});

	it('fetches files with GET', async () => {
		const fetchMock = stubFetch(async () => new Response('event 1\n', { status: 200 }));
		const transport = new FetchTransport({ baseUrl: 'http://hub.test', timeoutMs: 1_000 });

		await expect(transport.get('eventLog')).resolves.toBe('event 1\n');
		expect(fetchMock.mock.calls[0][0]).toBe('http://hub.test/eventLog');
		expect(fetchMock.mock.calls[0][1]?.method).toBe('GET');
	});

	it('fetches absolute URLs on the hub as given', async () => {
		const fetchMock = stubFetch(async () => new Response('mac,date\n', { status: 200 }));
		const transport = new FetchTransport({ baseUrl: 'http://hub.test', timeoutMs: 1_000 });

		await expect(transport.get('http://hub.test/stats/today.csv')).resolves.toBe('mac,date\n');
		expect(fetchMock.mock.calls[0][0]).toBe('http://hub.test/stats/today.csv');
	});

	it('refuses absolute URLs that point away from the hub', async () => {
		const fetchMock = stubFetch(async () => new Response('', { status: 200 }));
		const transport = new FetchTransport({ baseUrl: 'http://hub.test', timeoutMs: 1_000 });

		const err = await transport.get('http://elsewhere.test/stats.csv').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TransportError);
		expect(err).toHaveProperty('message', 'Hub request to http://elsewhere.test/stats.csv refused: not on http://hub.test');
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it('raises TransportError with the HTTP status for non-2xx replies', async () => {
		stubFetch(async () => new Response('busy', { status: 503, statusText: 'Service Unavailable' }));
		const transport = new FetchTransport({ baseUrl: 'http://hub.test', timeoutMs: 1_000 });

		const err = await transport.post('/cgi/json-req', 'req=').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TransportError);
		expect(err).toHaveProperty('status', 503);
		expect(err).toHaveProperty('message', 'Hub request to /cgi/json-req failed: HTTP 503 Service Unavailable');
	});

	it('wraps network failures', async () => {
		stubFetch(async () => {
			throw new TypeError('fetch failed');
		});
		const transport = new FetchTransport({ baseUrl: 'http://hub.test', timeoutMs: 1_000 });

		const err = await transport.post('/cgi/json-req', 'req=').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TransportError);
		expect(err).toHaveProperty('message', 'Hub request to /cgi/json-req failed: fetch failed');
	});

	it('aborts after the configured timeout', async () => {
		stubFetch((_input, init) => new Promise<Response>((_resolve, reject) => {
			init?.signal?.addEventListener('abort', () => {
				const abort = new Error('This operation was aborted');
				abort.name = 'AbortError';
				reject(abort);
			});
		}));
		const transport = new FetchTransport({ baseUrl: 'http://hub.test', timeoutMs: 5 });

		const err = await transport.post('/cgi/json-req', 'req=').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TransportError);
		expect(err).toHaveProperty('message', 'Hub request to /cgi/json-req timed out after 5ms');
	});
});
