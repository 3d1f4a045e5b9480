// src/hub/auth.ts
// Digest helpers for the hub's per-request auth key.
import { createHash, randomInt } from 'node:crypto';

export const JSON_REQUEST_PATH = '/cgi/json-req';

export function md5Hex(input: string): string {
	return createHash('md5').update(input, 'utf8').digest('hex');
}

export function computeHa1(userName: string, nonce: string, password: string): string {
	return md5Hex(`${userName}:${nonce}:${md5Hex(password)}`);
}

/**
 * The device recomputes this key for every request, so it binds the
 * envelope to the session nonce, the request id and our client nonce.
 */
export function computeAuthKey(ha1: string, requestId: number, cnonce: number): string {
	return md5Hex(`${ha1}:${requestId}:${cnonce}:JSON:${JSON_REQUEST_PATH}`);
}

export function randomClientNonce(): number {
	return randomInt(0, 2 ** 31 - 1);
}
