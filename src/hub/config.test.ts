import { describe, expect, it } from 'vitest';

import { DEFAULT_TARGET_URL, DEFAULT_TIMEOUT_MS, parseHubConfig } from './config.js';

describe('parseHubConfig', () => {
	it('fills defaults around the password', () => {
		expect(parseHubConfig({ platform: 'HomeHub', password: 'test-password' })).toEqual({
			targetURL: DEFAULT_TARGET_URL,
			userName: 'admin',
			password: 'test-password',
			debugLogging: false,
			timeoutMs: DEFAULT_TIMEOUT_MS,
			reloginOnExpiry: false,
		});
	});

	it('maps the platform keys and trims the URL', () => {
		expect(
			parseHubConfig({
				url: ' http://10.0.0.1/ ',
				username: 'operator',
				password: 'test-password',
				debug: true,
				timeout: 2500,
				reloginOnExpiry: true,
			}),
		).toEqual({
			targetURL: 'http://10.0.0.1',
			userName: 'operator',
			password: 'test-password',
			debugLogging: true,
			timeoutMs: 2500,
			reloginOnExpiry: true,
		});
	});

	it('prefers targetURL over url', () => {
		expect(parseHubConfig({ url: 'http://a.test', targetURL: 'http://b.test', password: 'x' }).targetURL).toBe(
			'http://b.test',
		);
	});

	it('requires a password', () => {
		expect(() => parseHubConfig({ username: 'admin' })).toThrow('Invalid Home Hub configuration: password: Required');
		expect(() => parseHubConfig({ password: '' })).toThrow('password: password is required');
	});

	it('rejects a non-positive timeout', () => {
		expect(() => parseHubConfig({ password: 'x', timeout: 0 })).toThrow(/timeout/);
	});
});
