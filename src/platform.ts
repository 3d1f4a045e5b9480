// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
	Service,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { parseHubConfig } from './hub/config.js';
import { describeError, isHubError } from './hub/errors.js';
import { HubClient } from './hub/hub-client.js';
import type { HubSummary } from './hub/hub-client.js';
import { toHubLogger } from './hub/logger.js';
import {
	type HubAccessoryEnv,
	type HubAccessoryRole,
	getHubContext,
} from './hub/hub-accessory-helpers.js';
import { configureHubLightAccessory } from './hub/hub-light-accessory.js';
import { configureHubRebootAccessory } from './hub/hub-reboot-accessory.js';

const DEFAULT_POLL_INTERVAL_SECONDS = 60;
// setInterval fires every 1ms for delays above 2^31-1 ms.
export const MAX_POLL_INTERVAL_SECONDS = 2_147_483;

/** Poll period in ms; 0 disables polling. */
export function pollIntervalMs(seconds: unknown): number {
	if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
		return DEFAULT_POLL_INTERVAL_SECONDS * 1000;
	}
	return Math.min(seconds, MAX_POLL_INTERVAL_SECONDS) * 1000;
}

const ACCESSORY_NAMES: Record<HubAccessoryRole, string> = {
	light: 'Hub Light',
	reboot: 'Hub Reboot',
};

export class HomeHubPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly config: PlatformConfig;
	private readonly client: HubClient | null = null;
	private readonly pollIntervalMs: number;
	private readonly rebootSwitch: boolean;

	private pollTimer: NodeJS.Timeout | null = null;
	private lightAccessory: PlatformAccessory | null = null;
	private lightService: Service | null = null;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.config = config;
		this.api = api;

		const raw = this.config as Record<string, unknown>;

		this.pollIntervalMs = pollIntervalMs(raw.pollIntervalSeconds);
		if (typeof raw.pollIntervalSeconds === 'number' && raw.pollIntervalSeconds > MAX_POLL_INTERVAL_SECONDS) {
			this.log.warn(
				'Home Hub: pollIntervalSeconds %d is above the limit; polling every %d seconds.',
				raw.pollIntervalSeconds,
				MAX_POLL_INTERVAL_SECONDS,
			);
		}

		this.rebootSwitch = raw.rebootSwitch === true;

		try {
			const hubConfig = parseHubConfig(raw);
			this.client = new HubClient({
				config: hubConfig,
				logger: toHubLogger(this.log, hubConfig.debugLogging),
			});
		} catch (err) {
			this.log.error('Home Hub: %s; plugin disabled.', describeError(err));
		}

		this.log.info(this.config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.loadHub();
		});

		this.api.on('shutdown', () => {
			this.stopPolling();
		});
	}

	private async loadHub(): Promise<void> {
		const client = this.client;
		if (!client) {
			return;
		}

		try {
			await client.login();
		} catch (err) {
			this.log.error('Home Hub: login failed: %s', describeError(err));
			if (isHubError(err, 'device')) {
				this.log.error('Home Hub: the hub refused the login; check username and password in config.json.');
			} else if (isHubError(err, 'transport')) {
				this.log.error('Home Hub: could not reach the hub; check the url in config.json.');
			}
			return;
		}

		let summary: HubSummary | null = null;
		try {
			summary = await client.summary();
			this.log.info(
				'Home Hub: connected to %s (serial=%s, firmware=%s)',
				summary.model,
				summary.serialNumber,
				summary.softwareVersion,
			);
		} catch (err) {
			this.log.warn('Home Hub: could not read device information: %s', describeError(err));
		}

		const env: HubAccessoryEnv = {
			log: this.log,
			api: this.api,
			client,
		};

		this.lightAccessory = this.ensureAccessory('light');
		this.lightService = configureHubLightAccessory(env, this.lightAccessory, summary);

		if (this.rebootSwitch) {
			configureHubRebootAccessory(env, this.ensureAccessory('reboot'), summary);
		} else {
			this.removeAccessory('reboot');
		}

		await this.refreshLight();
		this.startPolling();
	}

	private accessoryUuid(role: HubAccessoryRole): string {
		return this.api.hap.uuid.generate(`homehub-${role}`);
	}

	private ensureAccessory(role: HubAccessoryRole): PlatformAccessory {
		const uuid = this.accessoryUuid(role);
		const name = ACCESSORY_NAMES[role];

		let accessory = this.accessories.find(acc => acc.UUID === uuid);

		if (accessory) {
			this.log.info('Home Hub: using cached accessory for %s', name);
		} else {
			this.log.info('Home Hub: registering new accessory for %s', name);

			accessory = new this.api.platformAccessory(name, uuid);
			this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
			this.accessories.push(accessory);
		}

		getHubContext(accessory, role);
		return accessory;
	}

	private removeAccessory(role: HubAccessoryRole): void {
		const uuid = this.accessoryUuid(role);
		const index = this.accessories.findIndex(acc => acc.UUID === uuid);
		if (index === -1) {
			return;
		}

		const [stale] = this.accessories.splice(index, 1);
		this.log.info('Home Hub: removing stale accessory %s', stale.displayName);
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [stale]);
	}

	private startPolling(): void {
		this.stopPolling();

		if (this.pollIntervalMs === 0) {
			this.log.info('Home Hub: light polling disabled');
			return;
		}

		this.pollTimer = setInterval(() => {
			void this.refreshLight();
		}, this.pollIntervalMs);
	}

	private stopPolling(): void {
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
			this.pollTimer = null;
		}
	}

	private async refreshLight(): Promise<void> {
		const client = this.client;
		const accessory = this.lightAccessory;
		const service = this.lightService;
		if (!client || !accessory || !service) {
			return;
		}

		try {
			const status = await client.lightStatus();
			const brightness = await client.lightBrightness();

			const state = getHubContext(accessory, 'light');
			state.on = status === 'ON';
			state.brightness = Math.max(0, Math.min(100, Math.round(brightness)));
			state.lastUpdatedAt = Date.now();

			const Characteristic = this.api.hap.Characteristic;
			service.updateCharacteristic(Characteristic.On, state.on);
			service.updateCharacteristic(Characteristic.Brightness, state.brightness);

			this.log.debug('Home Hub: light is %s at %d%%', status, state.brightness);
		} catch (err) {
			this.log.warn('Home Hub: light refresh failed: %s', describeError(err));
		}
	}
}
