import { describe, expect, it } from 'vitest';

import { computeAuthKey, computeHa1 } from './auth.js';
import { XMO_INVALID_SESSION_ERR, XMO_REQUEST_ACTION_ERR } from './envelope.js';
import type { HubAction } from './envelope.js';
import {
	DeviceError,
	MalformedResponseError,
	NotAuthenticatedError,
	SessionExpiredError,
	TransportError,
} from './errors.js';
import { HubSession } from './session-manager.js';
import {
	errorReply,
	FakeTransport,
	loginReply,
	okReply,
	valueReply,
} from '../test-utils/fake-transport.js';

const getModel: HubAction = { id: 0, method: 'getValue', xpath: 'Device/DeviceInfo/ModelName', parameters: {} };

function createSession(transport: FakeTransport): HubSession {
	return new HubSession({
		transport,
		credentials: { userName: 'admin', password: 'test-password' },
		clientNonce: () => 42,
	});
}

async function loggedInSession(transport: FakeTransport): Promise<HubSession> {
	transport.reply(loginReply('987879', '2355345'));
	const session = createSession(transport);
	await session.login();
	return session;
}

describe('HubSession.login', () => {
	it('stores the session id and nonce from the login reply', async () => {
		const transport = new FakeTransport().reply(loginReply('987879', '2355345'));
		const session = createSession(transport);

		expect(session.isLoggedIn()).toBe(false);
		expect(session.phase).toBe('loggedOut');

		await expect(session.login()).resolves.toBe(true);

		expect(session.isLoggedIn()).toBe(true);
		expect(session.phase).toBe('loggedIn');
		expect(session.sessionId).toBe('987879');
		expect(session.nonce).toBe('2355345');
	});

	it('sends a priority logIn action bound to the empty pre-login session', async () => {
		const transport = new FakeTransport().reply(loginReply(987879, 2355345));
		await createSession(transport).login();

		const [sent] = transport.requests();
		expect(transport.posts[0].path).toBe('/cgi/json-req');
		expect(sent.request.id).toBe(0);
		expect(sent.request['session-id']).toBe('0');
		expect(sent.request.priority).toBe(true);
		expect(sent.request.actions[0].method).toBe('logIn');
		expect(sent.request.actions[0].parameters?.user).toBe('admin');
		expect(sent.request['auth-key']).toBe(
			computeAuthKey(computeHa1('admin', '', 'test-password'), 0, 42),
		);
	});

	it('never puts the password on the wire', async () => {
		const transport = new FakeTransport().reply(loginReply('987879', '2355345'));
		await createSession(transport).login();

		expect(transport.posts[0].body).not.toContain('test-password');
	});

	it('raises DeviceError with the code and description of a refused login', async () => {
		const transport = new FakeTransport().reply(errorReply(16777223, 'XMO_AUTHENTICATION_ERR'));
		const session = createSession(transport);

		const err = await session.login().catch((e: unknown) => e);

		expect(err).toBeInstanceOf(DeviceError);
		expect(err).toHaveProperty('code', 16777223);
		expect(err).toHaveProperty('description', 'XMO_AUTHENTICATION_ERR');
		expect(session.isLoggedIn()).toBe(false);
		expect(session.phase).toBe('loggedOut');
	});

	it('raises DeviceError when the logIn action itself failed', async () => {
		const transport = new FakeTransport().reply(
			okReply(
				[{ id: 0, error: { code: 16777223, description: 'XMO_AUTHENTICATION_ERR' } }],
				{ code: XMO_REQUEST_ACTION_ERR, description: 'XMO_REQUEST_ACTION_ERR' },
			),
		);

		await expect(createSession(transport).login()).rejects.toBeInstanceOf(DeviceError);
	});

	it('raises MalformedResponseError when the reply carries no session', async () => {
		const transport = new FakeTransport().reply(okReply([{ id: 0 }]));

		await expect(createSession(transport).login()).rejects.toBeInstanceOf(MalformedResponseError);
	});

	it('passes transport failures through', async () => {
		const transport = new FakeTransport().fail(new TransportError('connection refused'));
		const session = createSession(transport);

		await expect(session.login()).rejects.toBeInstanceOf(TransportError);
		expect(session.phase).toBe('loggedOut');
	});
});

describe('HubSession.call', () => {
	it('refuses to send before login', async () => {
		const transport = new FakeTransport();
		const session = createSession(transport);

		await expect(session.call([getModel])).rejects.toBeInstanceOf(NotAuthenticatedError);
		expect(transport.posts).toHaveLength(0);
	});

	it('returns the decoded reply for a successful call', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(valueReply('Home Hub 6 Type A'));

		const reply = await session.call([getModel]);

		expect(reply.actions[0].callbacks[0].parameters).toEqual({ value: 'Home Hub 6 Type A' });
	});

	it('binds each request to the device nonce and session id', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(valueReply('x'));

		await session.call([getModel]);

		const sent = transport.requests()[1].request;
		expect(sent['session-id']).toBe('987879');
		expect(sent.priority).toBe(false);
		expect(sent['auth-key']).toBe(computeAuthKey(computeHa1('admin', '2355345', 'test-password'), 1, 42));
	});

	it('increments the request id by exactly one per envelope, batched or not', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(valueReply('a'), okReply([{ id: 0 }, { id: 1 }, { id: 2 }]), valueReply('c'));

		await session.call([getModel]);
		await session.call([getModel, { ...getModel, id: 1 }, { ...getModel, id: 2 }]);
		await session.call([getModel]);

		expect(transport.requests().map((sent) => sent.request.id)).toEqual([0, 1, 2, 3]);
	});

	it('serializes overlapping callers', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(valueReply('a'), valueReply('b'), valueReply('c'));

		await Promise.all([session.call([getModel]), session.call([getModel]), session.call([getModel])]);

		expect(transport.maxInFlight).toBe(1);
		expect(transport.requests().map((sent) => sent.request.id)).toEqual([0, 1, 2, 3]);
	});

	it('turns the invalid-session code into SessionExpiredError and logs out', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(errorReply(XMO_INVALID_SESSION_ERR, 'Invalid user session'));

		const err = await session.call([getModel]).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(SessionExpiredError);
		expect(err).toHaveProperty('kind', 'sessionExpired');
		expect(err).toHaveProperty('message', 'Invalid user session');
		expect(session.isLoggedIn()).toBe(false);
		expect(session.phase).toBe('loggedOut');
		expect(session.nonce).toBe('2355345');
	});

	it('treats an action-level invalid-session code as expiry', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(
			okReply(
				[{ id: 0, error: { code: XMO_INVALID_SESSION_ERR, description: 'Invalid user session' } }],
				{ code: XMO_REQUEST_ACTION_ERR, description: 'XMO_REQUEST_ACTION_ERR' },
			),
		);

		await expect(session.call([getModel])).rejects.toBeInstanceOf(SessionExpiredError);
		expect(session.isLoggedIn()).toBe(false);
	});

	it('does not retry after expiry', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(errorReply(XMO_INVALID_SESSION_ERR, 'Invalid user session'));

		await expect(session.call([getModel])).rejects.toBeInstanceOf(SessionExpiredError);
		await expect(session.call([getModel])).rejects.toBeInstanceOf(NotAuthenticatedError);
		expect(transport.posts).toHaveLength(2);
	});

	it('surfaces other codes verbatim as DeviceError', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(errorReply(99999999, 'Something failed'));

		const err = await session.call([getModel]).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(DeviceError);
		expect(err).not.toBeInstanceOf(SessionExpiredError);
		expect(err).toHaveProperty('code', 99999999);
		expect(err).toHaveProperty('description', 'Something failed');
		expect(session.isLoggedIn()).toBe(true);
	});

	it('leaves per-action errors in the returned envelope', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply(
			okReply(
				[{ id: 0, error: { code: 16777221, description: 'XMO_UNKNOWN_PATH_ERR' } }],
				{ code: XMO_REQUEST_ACTION_ERR, description: 'XMO_REQUEST_ACTION_ERR' },
			),
		);

		const reply = await session.call([getModel]);

		expect(reply.actions[0].error).toEqual({ code: 16777221, description: 'XMO_UNKNOWN_PATH_ERR' });
	});

	it('raises MalformedResponseError for undecodable replies', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.reply('not json');

		await expect(session.call([getModel])).rejects.toBeInstanceOf(MalformedResponseError);
	});

	it('keeps going after a transport failure without resetting the counter', async () => {
		const transport = new FakeTransport();
		const session = await loggedInSession(transport);
		transport.fail(new TransportError('timed out')).reply(valueReply('x'));

		await expect(session.call([getModel])).rejects.toBeInstanceOf(TransportError);
		await session.call([getModel]);

		expect(transport.requests().map((sent) => sent.request.id)).toEqual([0, 1, 2]);
	});
});
