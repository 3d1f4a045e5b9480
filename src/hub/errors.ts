// src/hub/errors.ts

export type HubErrorKind =
	| 'notAuthenticated'
	| 'sessionExpired'
	| 'device'
	| 'transport'
	| 'malformedResponse';

/**
 * Base class for every failure the hub client raises. Callers branch on
 * `kind` (or instanceof) to tell an expired session apart from other
 * device errors.
 */
export abstract class HubError extends Error {
	public abstract readonly kind: HubErrorKind;

	protected constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

// Raised locally; nothing was sent to the device.
export class NotAuthenticatedError extends HubError {
	public readonly kind = 'notAuthenticated';

	public constructor(message = 'Not logged in to the hub; call login() first.') {
		super(message);
	}
}

export class SessionExpiredError extends HubError {
	public readonly kind = 'sessionExpired';

	public constructor(message = 'Invalid user session') {
		super(message);
	}
}

export class DeviceError extends HubError {
	public readonly kind = 'device';

	public constructor(
		public readonly code: number,
		public readonly description: string,
	) {
		super(`Hub returned error ${code}: ${description}`);
	}
}

/**
 * The request may or may not have reached the device, so a retry is not
 * known to be safe.
 */
export class TransportError extends HubError {
	public readonly kind = 'transport';

	public constructor(
		message: string,
		public readonly status?: number,
		cause?: unknown,
	) {
		super(message, { cause });
	}
}

export class MalformedResponseError extends HubError {
	public readonly kind = 'malformedResponse';

	public constructor(message: string, cause?: unknown) {
		super(message, { cause });
	}
}

export function isHubError(err: unknown): err is HubError;
export function isHubError<K extends HubErrorKind>(
	err: unknown,
	kind: K,
): err is HubError & { kind: K };
export function isHubError(err: unknown, kind?: HubErrorKind): boolean {
	if (!(err instanceof HubError)) {
		return false;
	}
	return kind === undefined || err.kind === kind;
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
