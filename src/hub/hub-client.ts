// src/hub/hub-client.ts
// Typed catalogue of hub calls built on the HubSession primitives.
import { z } from 'zod';

import type { HubConfig } from './config.js';
import { actionResult } from './envelope.js';
import type { ActionCallback, ActionParameters, HubAction, ResponseEnvelope } from './envelope.js';
import {
	DeviceError,
	MalformedResponseError,
	SessionExpiredError,
} from './errors.js';
import type { HubLogger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import { HubSession } from './session-manager.js';
import type { SessionPhase } from './session-manager.js';
import { FetchTransport } from './transport.js';
import type { HubTransport } from './transport.js';
import { hostXPath, XPATHS } from './xpaths.js';

export const EVENT_LOG_PATH = '/eventLog';
export const BANDWIDTH_STATS_PATH = '/stats.csv';

export type LightStatus = 'ON' | 'OFF';

export interface ConnectedDevice {
	id: number;
	ipAddress: string;
	physicalAddress: string;
	type: string;
	hostName?: string;
	active: boolean;
}

export interface BandwidthUsage {
	macAddress: string;
	date: string;
	receivedMb: number;
	sentMb: number;
}

export interface HubSummary {
	model: string;
	serialNumber: string;
	softwareVersion: string;
}

export interface HubClientOptions {
	config: HubConfig;
	logger?: HubLogger;
	transport?: HubTransport;
	clientNonce?: () => number;
}

const HostSchema = z.object({
	uid: z.number(),
	IPAddress: z.string().default(''),
	PhysAddress: z.string().default(''),
	InterfaceType: z.string().default(''),
	HostName: z.string().optional(),
	UserHostName: z.string().optional(),
	Active: z.boolean().default(true),
});

type HostRecord = z.infer<typeof HostSchema>;

function toConnectedDevice(host: HostRecord): ConnectedDevice {
	const hostName = host.UserHostName || host.HostName || undefined;
	return {
		id: host.uid,
		ipAddress: host.IPAddress,
		physicalAddress: host.PhysAddress,
		type: host.InterfaceType,
		...(hostName ? { hostName } : {}),
		active: host.Active,
	};
}

// YYYYMMDD in local time, the format the bandwidth monitor takes.
export function formatStatsDate(date: Date): string {
	const month = String(date.getMonth() + 1).padStart(2, '0');
	const day = String(date.getDate()).padStart(2, '0');
	return `${date.getFullYear()}${month}${day}`;
}

/**
 * Rows look like `mac,date,received,sent`; lines that do not carry two
 * numeric counters (headers, blank lines) are skipped.
 */
export function parseBandwidthStats(csv: string): BandwidthUsage[] {
	const rows: BandwidthUsage[] = [];
	for (const line of csv.split(/\r?\n/)) {
		const cols = line.split(',').map((col) => col.trim());
		if (cols.length < 4) {
			continue;
		}
		const received = Number(cols[2]);
		const sent = Number(cols[3]);
		if (cols[2] === '' || cols[3] === '' || !Number.isFinite(received) || !Number.isFinite(sent)) {
			continue;
		}
		rows.push({ macAddress: cols[0], date: cols[1], receivedMb: received, sentMb: sent });
	}
	return rows;
}

export class HubClient {
	private readonly log: HubLogger;
	private readonly session: HubSession;
	private readonly transport: HubTransport;
	private readonly reloginOnExpiry: boolean;
	private queue: Promise<void> = Promise.resolve();

	public constructor(options: HubClientOptions) {
		const { config } = options;
		this.log = options.logger ?? createConsoleLogger('[homehub]', config.debugLogging);
		this.reloginOnExpiry = config.reloginOnExpiry;
		this.transport = options.transport ?? new FetchTransport({
			baseUrl: config.targetURL,
			timeoutMs: config.timeoutMs,
			logger: this.log,
		});
		this.session = new HubSession({
			transport: this.transport,
			credentials: { userName: config.userName, password: config.password },
			logger: this.log,
			clientNonce: options.clientNonce,
		});
	}

	public get phase(): SessionPhase {
		return this.session.phase;
	}

	public isLoggedIn(): boolean {
		return this.session.isLoggedIn();
	}

	public async login(): Promise<true> {
		return this.exclusive(() => this.session.login());
	}

	public async ensureLoggedIn(): Promise<void> {
		await this.exclusive(() => this.loginIfNeeded());
	}

	// ----- Device information -----

	public version(): Promise<string> {
		return this.readString(XPATHS.hubVersion);
	}

	public softwareVersion(): Promise<string> {
		return this.readString(XPATHS.softwareVersion);
	}

	public hardwareVersion(): Promise<string> {
		return this.readString(XPATHS.hardwareVersion);
	}

	public serialNumber(): Promise<string> {
		return this.readString(XPATHS.serialNumber);
	}

	public maintenanceFirmwareVersion(): Promise<string> {
		return this.readString(XPATHS.maintenanceFirmwareVersion);
	}

	/** DSL modem firmware, returned exactly as the hub reports it. */
	public dataPumpVersion(): Promise<string> {
		return this.readString(XPATHS.dataPumpVersion);
	}

	public localTime(): Promise<string> {
		return this.readString(XPATHS.localTime);
	}

	/** Model, serial and firmware in one envelope. */
	public async summary(): Promise<HubSummary> {
		const [model, serialNumber, softwareVersion] = await this.readValues([
			XPATHS.hubVersion,
			XPATHS.serialNumber,
			XPATHS.softwareVersion,
		]);
		return {
			model: this.asString(model, XPATHS.hubVersion),
			serialNumber: this.asString(serialNumber, XPATHS.serialNumber),
			softwareVersion: this.asString(softwareVersion, XPATHS.softwareVersion),
		};
	}

	// ----- Broadband -----

	public publicIPAddress(): Promise<string> {
		return this.readString(XPATHS.publicIp4);
	}

	public publicSubnetMask(): Promise<string> {
		return this.readString(XPATHS.publicSubnetMask);
	}

	public internetConnectionStatus(): Promise<string> {
		return this.readString(XPATHS.wanInternetStatus);
	}

	public broadbandProductType(): Promise<string> {
		return this.readString(XPATHS.interfaceType);
	}

	public downstreamSyncSpeed(): Promise<number> {
		return this.readNumber(XPATHS.downstreamCurrRate);
	}

	public upstreamSyncSpeed(): Promise<number> {
		return this.readNumber(XPATHS.upstreamCurrRate);
	}

	public dataSent(): Promise<number> {
		return this.readNumber(XPATHS.dataSent);
	}

	public dataReceived(): Promise<number> {
		return this.readNumber(XPATHS.dataReceived);
	}

	// ----- Wi-Fi, DHCP and file sharing -----

	public wifiSSID(): Promise<string> {
		return this.readString(XPATHS.wifi24Ssid);
	}

	public wifiSecurityMode(): Promise<string> {
		return this.readString(XPATHS.wifi24SecurityMode);
	}

	public dhcpAuthoritative(): Promise<boolean> {
		return this.readBoolean(XPATHS.dhcpAuthoritative);
	}

	public dhcpPoolStart(): Promise<string> {
		return this.readString(XPATHS.dhcpPoolStart);
	}

	public dhcpPoolEnd(): Promise<string> {
		return this.readString(XPATHS.dhcpPoolEnd);
	}

	public dhcpSubnetMask(): Promise<string> {
		return this.readString(XPATHS.dhcpSubnetMask);
	}

	public sambaHost(): Promise<string> {
		return this.readString(XPATHS.sambaHost);
	}

	public sambaIP(): Promise<string> {
		return this.readString(XPATHS.sambaIp);
	}

	// ----- Hosts -----

	public async connectedDevices(): Promise<ConnectedDevice[]> {
		const value = await this.readValue(XPATHS.connectedDevices);
		const hosts = z.array(HostSchema).safeParse(value);
		if (!hosts.success) {
			throw new MalformedResponseError(`Unexpected host list at ${XPATHS.connectedDevices}`, hosts.error);
		}
		return hosts.data.filter((host) => host.Active).map(toConnectedDevice);
	}

	public async deviceInfo(id: number): Promise<ConnectedDevice> {
		const xpath = hostXPath(id);
		const host = HostSchema.safeParse(await this.readValue(xpath));
		if (!host.success) {
			throw new MalformedResponseError(`Unexpected host entry at ${xpath}`, host.error);
		}
		return toConnectedDevice(host.data);
	}

	// ----- Status light -----

	public async lightStatus(): Promise<LightStatus> {
		const status = (await this.readString(XPATHS.hubLightStatus)).toUpperCase();
		if (status !== 'ON' && status !== 'OFF') {
			throw new MalformedResponseError(`Unexpected light status "${status}"`);
		}
		return status;
	}

	public lightBrightness(): Promise<number> {
		return this.readNumber(XPATHS.hubLightBrightness);
	}

	public async lightEnable(on: boolean): Promise<void> {
		await this.writeValue(XPATHS.hubLightStatus, on ? 'ON' : 'OFF');
	}

	public async lightBrightnessSet(percent: number): Promise<void> {
		if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
			throw new RangeError(`Light brightness must be an integer between 0 and 100, got ${percent}`);
		}
		await this.writeValue(XPATHS.hubLightBrightness, percent);
	}

	// ----- Maintenance -----

	/** Never retried: a second reboot after re-login would restart the hub twice. */
	public async reboot(): Promise<void> {
		await this.perform(
			{ id: 0, method: 'reboot', xpath: XPATHS.device, parameters: { source: 'GUI' } },
			false,
		);
		this.log.warn('Home Hub reboot requested');
	}

	public async eventLog(): Promise<string[]> {
		const text = await this.publishAndFetch(
			{ id: 0, method: 'uploadEventLogFile', xpath: XPATHS.eventLog },
			EVENT_LOG_PATH,
		);
		return text.split(/\r?\n/).filter((line) => line.trim().length > 0);
	}

	public async bandwidthMonitor(date: Date = new Date()): Promise<BandwidthUsage[]> {
		const day = formatStatsDate(date);
		const text = await this.publishAndFetch(
			{
				id: 0,
				method: 'uploadBMStatisticsFile',
				xpath: XPATHS.bandwidthMonitoring,
				parameters: { startDate: day, endDate: day },
			},
			BANDWIDTH_STATS_PATH,
		);
		return parseBandwidthStats(text);
	}

	// ----- Primitives -----

	/** Raw batched call for actions the catalogue does not cover. Not retried. */
	public async call(actions: readonly HubAction[]): Promise<ResponseEnvelope> {
		return this.run(() => this.session.call(actions), false);
	}

	private async readValue(xpath: string): Promise<unknown> {
		const [value] = await this.readValues([xpath]);
		return value;
	}

	private async readValues(xpaths: readonly string[]): Promise<unknown[]> {
		const actions: HubAction[] = xpaths.map((xpath, id) => ({
			id,
			method: 'getValue',
			xpath,
			parameters: {},
		}));

		const reply = await this.run(() => this.session.call(actions), true);

		return actions.map((action) => {
			const callback = this.successCallback(reply, action);
			if (!('value' in callback.parameters)) {
				throw new MalformedResponseError(`Hub reply for ${action.xpath ?? action.method} carries no value`);
			}
			return callback.parameters.value;
		});
	}

	private async readString(xpath: string): Promise<string> {
		return this.asString(await this.readValue(xpath), xpath);
	}

	private async readNumber(xpath: string): Promise<number> {
		const value = await this.readValue(xpath);
		if (typeof value === 'number' && Number.isFinite(value)) {
			return value;
		}
		if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) {
			return Number(value.trim());
		}
		throw new MalformedResponseError(`Expected a number at ${xpath}, got ${JSON.stringify(value)}`);
	}

	private async readBoolean(xpath: string): Promise<boolean> {
		const value = await this.readValue(xpath);
		if (typeof value === 'boolean') {
			return value;
		}
		if (value === 'true' || value === 'false') {
			return value === 'true';
		}
		throw new MalformedResponseError(`Expected a boolean at ${xpath}, got ${JSON.stringify(value)}`);
	}

	private asString(value: unknown, xpath: string): string {
		if (typeof value === 'string') {
			return value;
		}
		if (typeof value === 'number') {
			return String(value);
		}
		throw new MalformedResponseError(`Expected a string at ${xpath}, got ${JSON.stringify(value)}`);
	}

	// Absolute-value writes land the same way twice, so they may be retried.
	private async writeValue(xpath: string, value: string | number | boolean): Promise<void> {
		await this.perform({ id: 0, method: 'setValue', xpath, parameters: { value } }, true);
	}

	private async perform(action: HubAction, idempotent: boolean): Promise<ActionParameters> {
		const reply = await this.run(() => this.session.call([action]), idempotent);
		return this.successCallback(reply, action).parameters;
	}

	private async publishAndFetch(action: HubAction, defaultPath: string): Promise<string> {
		const params = await this.perform(action, false);
		const path = typeof params.uri === 'string' && params.uri.length > 0 ? params.uri : defaultPath;
		return this.transport.get(path);
	}

	private successCallback(reply: ResponseEnvelope, action: HubAction): ActionCallback {
		const result = actionResult(reply, action.id);
		if (!result) {
			throw new MalformedResponseError(`Hub reply has no result for action ${action.id} (${action.method})`);
		}
		if (!result.ok) {
			throw new DeviceError(result.error.code, result.error.description);
		}
		// Writes may be acknowledged without a callback.
		return result.callbacks[0] ?? { parameters: {} };
	}

	private async run<T>(operation: () => Promise<T>, idempotent: boolean): Promise<T> {
		return this.exclusive(async () => {
			await this.loginIfNeeded();
			try {
				return await operation();
			} catch (err) {
				if (!(err instanceof SessionExpiredError) || !idempotent || !this.reloginOnExpiry) {
					throw err;
				}
				this.log.warn('Home Hub session expired; logging in again and retrying once.');
				await this.session.login();
				return operation();
			}
		});
	}

	private async loginIfNeeded(): Promise<void> {
		if (!this.session.isLoggedIn()) {
			await this.session.login();
		}
	}

	private exclusive<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task);
		this.queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}
}
