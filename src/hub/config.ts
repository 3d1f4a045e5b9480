// src/hub/config.ts
import { z } from 'zod';

export const DEFAULT_TARGET_URL = 'http://192.168.1.254';
export const DEFAULT_USER_NAME = 'admin';
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface HubConfig {
	targetURL: string;
	userName: string;
	password: string;
	debugLogging: boolean;
	timeoutMs: number;
	// Retry idempotent calls once after re-authenticating on an expired session.
	reloginOnExpiry: boolean;
}

const trimmedString = z.string().trim();

// Accepts the Homebridge platform block as-is; unknown keys are ignored.
export const HubConfigSchema = z
	.object({
		url: trimmedString.min(1).optional(),
		targetURL: trimmedString.min(1).optional(),
		username: trimmedString.min(1).optional(),
		password: z.string().min(1, 'password is required'),
		debug: z.boolean().optional(),
		timeout: z.number().int().positive().optional(),
		reloginOnExpiry: z.boolean().optional(),
	})
	.transform((raw): HubConfig => ({
		targetURL: (raw.targetURL ?? raw.url ?? DEFAULT_TARGET_URL).replace(/\/+$/, ''),
		userName: raw.username ?? DEFAULT_USER_NAME,
		password: raw.password,
		debugLogging: raw.debug ?? false,
		timeoutMs: raw.timeout ?? DEFAULT_TIMEOUT_MS,
		reloginOnExpiry: raw.reloginOnExpiry ?? false,
	}));

export function parseHubConfig(raw: unknown): HubConfig {
	const parsed = HubConfigSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
			.join('; ');
		throw new Error(`Invalid Home Hub configuration: ${issues}`);
	}
	return parsed.data;
}
