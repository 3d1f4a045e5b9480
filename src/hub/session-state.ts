// src/hub/session-state.ts

export interface HubCredentials {
	readonly userName: string;
	readonly password: string;
}

/** Immutable view of the session handed to the envelope codec for one request. */
export interface SessionSnapshot {
	readonly userName: string;
	readonly password: string;
	readonly sessionId: string;
	readonly nonce: string;
	readonly requestId: number;
}

/**
 * Per-session identifiers for one client. Session ids and nonces are opaque
 * tokens; they look numeric on the wire but are only ever stored as strings.
 */
export class SessionState {
	public userName: string;
	public password: string;

	private sessionIdValue = '';
	private nonceValue = '';
	private requestCounter = 0;

	public constructor(credentials: HubCredentials) {
		this.userName = credentials.userName;
		this.password = credentials.password;
	}

	public get sessionId(): string {
		return this.sessionIdValue;
	}

	public get nonce(): string {
		return this.nonceValue;
	}

	// The value the next outbound envelope will carry.
	public get pendingRequestId(): number {
		return this.requestCounter;
	}

	public nextRequestId(): number {
		const id = this.requestCounter;
		this.requestCounter += 1;
		return id;
	}

	public applyLoginResult(sessionId: string, nonce: string): void {
		this.sessionIdValue = sessionId;
		this.nonceValue = nonce;
	}

	// Keeps the nonce, credentials and counter; only the session id goes.
	public invalidate(): void {
		this.sessionIdValue = '';
	}

	public isLoggedIn(): boolean {
		return this.sessionIdValue.length > 0;
	}

	public snapshot(requestId: number): SessionSnapshot {
		return {
			userName: this.userName,
			password: this.password,
			sessionId: this.sessionIdValue,
			nonce: this.nonceValue,
			requestId,
		};
	}
}
