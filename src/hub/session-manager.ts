// src/hub/session-manager.ts
// Login handshake and the single-session call primitive.
import { JSON_REQUEST_PATH, randomClientNonce } from './auth.js';
import {
	actionResult,
	decodeResponse,
	encodeRequest,
	findSessionExpiry,
	isSuccessCode,
	LoginParametersSchema,
	XMO_REQUEST_ACTION_ERR,
} from './envelope.js';
import type { HubAction, ResponseEnvelope } from './envelope.js';
import {
	DeviceError,
	MalformedResponseError,
	NotAuthenticatedError,
	SessionExpiredError,
} from './errors.js';
import type { HubLogger } from './logger.js';
import { silentLogger } from './logger.js';
import { SessionState } from './session-state.js';
import type { HubCredentials } from './session-state.js';
import type { HubTransport } from './transport.js';

export type SessionPhase = 'loggedOut' | 'authenticating' | 'loggedIn';

export const LOGIN_METHOD = 'logIn';

const LOGIN_SESSION_OPTIONS = {
	nss: [{ name: 'gtw', uri: 'http://sagemcom.com/gateway-data' }],
	language: 'ident',
	'context-flags': {
		'get-content-name': true,
		'local-time': true,
	},
	'capability-depth': 2,
	'capability-flags': {
		name: true,
		'default-value': false,
		restriction: true,
		description: false,
	},
	'time-format': 'ISO_8601',
} as const;

export interface HubSessionOptions {
	transport: HubTransport;
	credentials: HubCredentials;
	logger?: HubLogger;
	// Injected for deterministic envelopes in tests.
	clientNonce?: () => number;
}

export class HubSession {
	private readonly transport: HubTransport;
	private readonly state: SessionState;
	private readonly log: HubLogger;
	private readonly clientNonce: () => number;

	private phaseValue: SessionPhase = 'loggedOut';
	private queue: Promise<void> = Promise.resolve();

	public constructor(options: HubSessionOptions) {
		this.transport = options.transport;
		this.state = new SessionState(options.credentials);
		this.log = options.logger ?? silentLogger;
		this.clientNonce = options.clientNonce ?? randomClientNonce;
	}

	public get phase(): SessionPhase {
		return this.phaseValue;
	}

	public get sessionId(): string {
		return this.state.sessionId;
	}

	public get nonce(): string {
		return this.state.nonce;
	}

	public isLoggedIn(): boolean {
		return this.state.isLoggedIn();
	}

	/**
	 * Run the challenge/response login. Resolves true once the device has
	 * issued a session id and nonce; structured errors raise DeviceError.
	 */
	public async login(): Promise<true> {
		return this.exclusive<true>(async () => {
			const previous = this.phaseValue;
			this.setPhase('authenticating');

			try {
				const reply = await this.exchange(
					[
						{
							id: 0,
							method: LOGIN_METHOD,
							parameters: {
								user: this.state.userName,
								persistent: 'true',
								'session-options': LOGIN_SESSION_OPTIONS,
							},
						},
					],
					true,
				);

				const failure = this.replyFailure(reply) ?? this.actionFailure(reply, 0);
				if (failure) {
					throw new DeviceError(failure.code, failure.description);
				}

				const callback = reply.actions.find((action) => action.id === 0)?.callbacks[0];
				const params = LoginParametersSchema.safeParse(callback?.parameters);
				if (!params.success || params.data.id.length === 0) {
					throw new MalformedResponseError('Hub login reply is missing the session id or nonce', params.error);
				}

				this.state.applyLoginResult(params.data.id, params.data.nonce);
				this.setPhase('loggedIn');
				this.log.info('Home Hub login successful for user %s', this.state.userName);
				return true;
			} catch (err) {
				this.setPhase(this.state.isLoggedIn() ? previous : 'loggedOut');
				throw err;
			}
		});
	}

	/**
	 * Issue one envelope carrying every action. Never retried: an expired
	 * session is surfaced as SessionExpiredError after invalidating state.
	 */
	public async call(actions: readonly HubAction[]): Promise<ResponseEnvelope> {
		return this.exclusive(async () => {
			if (!this.state.isLoggedIn()) {
				throw new NotAuthenticatedError();
			}

			const reply = await this.exchange(actions, false);

			const expiry = findSessionExpiry(reply);
			if (expiry) {
				this.state.invalidate();
				this.setPhase('loggedOut');
				throw new SessionExpiredError(expiry.description || undefined);
			}

			const failure = this.replyFailure(reply);
			if (failure) {
				throw new DeviceError(failure.code, failure.description);
			}

			return reply;
		});
	}

	private async exchange(actions: readonly HubAction[], priority: boolean): Promise<ResponseEnvelope> {
		const requestId = this.state.nextRequestId();
		const body = encodeRequest(this.state.snapshot(requestId), actions, this.clientNonce(), priority);

		this.log.debug('Hub request #%d: %s', requestId, actions.map((action) => action.method).join(', '));
		const text = await this.transport.post(JSON_REQUEST_PATH, body);
		this.log.debug('Hub reply #%d: %s', requestId, text);

		return decodeResponse(text);
	}

	// XMO_REQUEST_ACTION_ERR only says "look at the actions"; the caller reads those.
	private replyFailure(reply: ResponseEnvelope): { code: number; description: string } | undefined {
		const { code } = reply.error;
		if (isSuccessCode(code) || code === XMO_REQUEST_ACTION_ERR) {
			return undefined;
		}
		return reply.error;
	}

	private actionFailure(reply: ResponseEnvelope, actionId: number): { code: number; description: string } | undefined {
		const result = actionResult(reply, actionId);
		return result && !result.ok ? result.error : undefined;
	}

	private setPhase(next: SessionPhase): void {
		if (next !== this.phaseValue) {
			this.log.debug('Hub session %s -> %s', this.phaseValue, next);
			this.phaseValue = next;
		}
	}

	// The device tracks one session and a strictly increasing counter, so exchanges never overlap.
	private exclusive<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task);
		this.queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}
}
