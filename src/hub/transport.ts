// src/hub/transport.ts
import { describeError, TransportError } from './errors.js';
import type { HubLogger } from './logger.js';
import { silentLogger } from './logger.js';

/**
 * Everything the protocol driver needs from the network: send a body,
 * get a body back, or fail with TransportError.
 */
export interface HubTransport {
	post(path: string, body: string): Promise<string>;
	get(path: string): Promise<string>;
}

export interface FetchTransportOptions {
	baseUrl: string;
	timeoutMs: number;
	logger?: HubLogger;
}

export class FetchTransport implements HubTransport {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly log: HubLogger;

	public constructor(options: FetchTransportOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		this.timeoutMs = options.timeoutMs;
		this.log = options.logger ?? silentLogger;
	}

	public async post(path: string, body: string): Promise<string> {
		return this.exchange(path, {
			method: 'POST',
			headers: {
				'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
				Accept: 'application/json',
			},
			body,
		});
	}

	public async get(path: string): Promise<string> {
		return this.exchange(path, { method: 'GET' });
	}

	// The hub may hand back file locations as paths or as absolute URLs on itself.
	private resolveUrl(path: string): string {
		if (!/^[a-z][a-z\d+.-]*:\/\//i.test(path)) {
			return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
		}
		let target: URL;
		try {
			target = new URL(path);
		} catch (err) {
			throw new TransportError(`Hub request to ${path} failed: invalid URL`, undefined, err);
		}
		if (target.origin !== new URL(this.baseUrl).origin) {
			throw new TransportError(`Hub request to ${path} refused: not on ${this.baseUrl}`);
		}
		return path;
	}

	private async exchange(path: string, init: RequestInit): Promise<string> {
		const url = this.resolveUrl(path);
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

		this.log.debug('Hub %s %s', init.method ?? 'GET', url);

		try {
			const res = await fetch(url, { ...init, signal: controller.signal });
			const text = await res.text();

			if (!res.ok) {
				throw new TransportError(
					`Hub request to ${path} failed: HTTP ${res.status} ${res.statusText}`,
					res.status,
				);
			}

			return text;
		} catch (err) {
			if (err instanceof TransportError) {
				throw err;
			}
			if (err instanceof Error && err.name === 'AbortError') {
				throw new TransportError(`Hub request to ${path} timed out after ${this.timeoutMs}ms`, undefined, err);
			}
			throw new TransportError(`Hub request to ${path} failed: ${describeError(err)}`, undefined, err);
		} finally {
			clearTimeout(timeoutId);
		}
	}
}
