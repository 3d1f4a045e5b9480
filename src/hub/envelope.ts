// src/hub/envelope.ts
// Request/response envelope for the hub's JSON management API.
import { z } from 'zod';

import { computeAuthKey, computeHa1 } from './auth.js';
import { MalformedResponseError } from './errors.js';
import type { SessionSnapshot } from './session-state.js';

export const XMO_SUCCESS_CODE = 0;
export const XMO_REQUEST_NO_ERR = 16777216;
export const XMO_INVALID_SESSION_ERR = 16777219;
export const XMO_REQUEST_ACTION_ERR = 16777236;
export const XMO_NO_ERR = 16777238;

const SUCCESS_CODES: ReadonlySet<number> = new Set([
	XMO_SUCCESS_CODE,
	XMO_REQUEST_NO_ERR,
	XMO_NO_ERR,
]);

export function isSuccessCode(code: number): boolean {
	return SUCCESS_CODES.has(code);
}

export function isSessionExpiredCode(code: number): boolean {
	return code === XMO_INVALID_SESSION_ERR;
}

export type ActionParameters = Record<string, unknown>;

export interface HubAction {
	id: number;
	method: string;
	xpath?: string;
	parameters?: ActionParameters;
}

export interface RequestEnvelope {
	request: {
		id: number;
		'session-id': string;
		priority: boolean;
		actions: HubAction[];
		cnonce: number;
		'auth-key': string;
	};
}

const OpaqueTokenSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const XmoStatusSchema = z.object({
	code: z.number(),
	description: z.string().default(''),
});

export type XmoStatus = z.infer<typeof XmoStatusSchema>;

const CallbackSchema = z.object({
	uid: z.number().optional(),
	result: XmoStatusSchema.optional(),
	xpath: z.string().optional(),
	parameters: z.record(z.unknown()).default({}),
});

export type ActionCallback = z.infer<typeof CallbackSchema>;

const ActionReplySchema = z.object({
	uid: z.number().optional(),
	id: z.number(),
	error: XmoStatusSchema.optional(),
	callbacks: z.array(CallbackSchema).default([]),
});

export type ActionReply = z.infer<typeof ActionReplySchema>;

const ReplyBodySchema = z.object({
	reply: z.object({
		uid: z.number().optional(),
		id: z.number().optional(),
		error: XmoStatusSchema,
		actions: z.array(ActionReplySchema).default([]),
		events: z.array(z.unknown()).default([]),
	}),
});

export interface ResponseEnvelope {
	requestId?: number;
	error: XmoStatus;
	actions: ActionReply[];
}

export type ActionResult =
	| { ok: true; id: number; callbacks: ActionCallback[] }
	| { ok: false; id: number; error: XmoStatus };

/** Session parameters the login callback hands back. */
export const LoginParametersSchema = z.object({
	id: OpaqueTokenSchema,
	nonce: OpaqueTokenSchema,
});

export function buildRequestEnvelope(
	session: SessionSnapshot,
	actions: readonly HubAction[],
	cnonce: number,
	priority = false,
): RequestEnvelope {
	const ha1 = computeHa1(session.userName, session.nonce, session.password);

	return {
		request: {
			id: session.requestId,
			// The device expects "0" until it has issued a session.
			'session-id': session.sessionId.length > 0 ? session.sessionId : '0',
			priority,
			actions: actions.map((action) => ({ ...action })),
			cnonce,
			'auth-key': computeAuthKey(ha1, session.requestId, cnonce),
		},
	};
}

export function serializeRequestEnvelope(envelope: RequestEnvelope): string {
	return new URLSearchParams({ req: JSON.stringify(envelope) }).toString();
}

export function encodeRequest(
	session: SessionSnapshot,
	actions: readonly HubAction[],
	cnonce: number,
	priority = false,
): string {
	return serializeRequestEnvelope(buildRequestEnvelope(session, actions, cnonce, priority));
}

export function decodeResponse(text: string): ResponseEnvelope {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (err) {
		throw new MalformedResponseError('Hub returned a non-JSON payload', err);
	}

	const parsed = ReplyBodySchema.safeParse(json);
	if (!parsed.success) {
		const first = parsed.error.issues[0];
		const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown shape';
		throw new MalformedResponseError(`Hub reply does not match the envelope (${where})`, parsed.error);
	}

	const { reply } = parsed.data;
	return {
		requestId: reply.id,
		error: reply.error,
		actions: reply.actions,
	};
}

export function findActionReply(envelope: ResponseEnvelope, actionId: number): ActionReply | undefined {
	return envelope.actions.find((action) => action.id === actionId);
}

export function actionResult(envelope: ResponseEnvelope, actionId: number): ActionResult | undefined {
	const reply = findActionReply(envelope, actionId);
	if (!reply) {
		return undefined;
	}

	if (reply.error && !isSuccessCode(reply.error.code)) {
		return { ok: false, id: reply.id, error: reply.error };
	}

	return { ok: true, id: reply.id, callbacks: reply.callbacks };
}

/** First action-level or reply-level status carrying the session-expired code. */
export function findSessionExpiry(envelope: ResponseEnvelope): XmoStatus | undefined {
	if (isSessionExpiredCode(envelope.error.code)) {
		return envelope.error;
	}
	return envelope.actions
		.map((action) => action.error)
		.find((error): error is XmoStatus => error !== undefined && isSessionExpiredCode(error.code));
}
