// src/test-utils/fake-transport.ts
// In-process stand-in for the hub's HTTP endpoint.
import { z } from 'zod';

import { XMO_NO_ERR, XMO_REQUEST_NO_ERR } from '../hub/envelope.js';
import { TransportError } from '../hub/errors.js';
import type { HubTransport } from '../hub/transport.js';

const SentRequestSchema = z.object({
	request: z.object({
		id: z.number(),
		'session-id': z.string(),
		priority: z.boolean(),
		actions: z.array(
			z.object({
				id: z.number(),
				method: z.string(),
				xpath: z.string().optional(),
				parameters: z.record(z.unknown()).optional(),
			}),
		),
		cnonce: z.number(),
		'auth-key': z.string(),
	}),
});

export type SentRequest = z.infer<typeof SentRequestSchema>;

export class FakeTransport implements HubTransport {
	public readonly posts: Array<{ path: string; body: string }> = [];
	public readonly gets: string[] = [];
	public readonly files = new Map<string, string>();
	public maxInFlight = 0;

	private readonly replies: Array<string | Error> = [];
	private inFlight = 0;

	public reply(...bodies: string[]): this {
		this.replies.push(...bodies);
		return this;
	}

	public fail(err: Error): this {
		this.replies.push(err);
		return this;
	}

	public async post(path: string, body: string): Promise<string> {
		this.posts.push({ path, body });
		this.inFlight += 1;
		this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

		try {
			await new Promise((resolve) => setTimeout(resolve, 1));
			const next = this.replies.shift();
			if (next === undefined) {
				throw new Error(`FakeTransport: no reply queued for request #${this.posts.length}`);
			}
			if (next instanceof Error) {
				throw next;
			}
			return next;
		} finally {
			this.inFlight -= 1;
		}
	}

	public async get(path: string): Promise<string> {
		this.gets.push(path);
		const file = this.files.get(path);
		if (file === undefined) {
			throw new TransportError(`Hub request to ${path} failed: HTTP 404 Not Found`, 404);
		}
		return file;
	}

	public requests(): SentRequest[] {
		return this.posts.map(({ body }) => {
			const req = new URLSearchParams(body).get('req');
			if (req === null) {
				throw new Error('FakeTransport: body has no req field');
			}
			return SentRequestSchema.parse(JSON.parse(req));
		});
	}
}

const OK = { code: XMO_REQUEST_NO_ERR, description: 'XMO_REQUEST_NO_ERR' };
const ACTION_OK = { code: XMO_NO_ERR, description: 'XMO_NO_ERR' };

export interface FakeActionReply {
	id: number;
	parameters?: Record<string, unknown>;
	error?: { code: number; description: string };
}

export function okReply(actions: FakeActionReply[], error = OK): string {
	return JSON.stringify({
		reply: {
			uid: 0,
			id: 0,
			error,
			actions: actions.map((action, index) => ({
				uid: index + 1,
				id: action.id,
				error: action.error ?? ACTION_OK,
				callbacks: action.parameters
					? [{ uid: 1, result: ACTION_OK, xpath: '', parameters: action.parameters }]
					: [],
			})),
			events: [],
		},
	});
}

export function valueReply(value: unknown): string {
	return okReply([{ id: 0, parameters: { value } }]);
}

export function loginReply(sessionId: string | number, nonce: string | number): string {
	return okReply([{ id: 0, parameters: { id: sessionId, nonce } }]);
}

export function errorReply(code: number, description: string): string {
	return JSON.stringify({
		reply: { uid: 0, id: 0, error: { code, description } },
	});
}
