// src/hub/hub-accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import { describeError } from './errors.js';
import type { HubClient, HubSummary } from './hub-client.js';

export type HubAccessoryRole = 'light' | 'reboot';

// Context stored on the accessory
export interface HubAccessoryContext {
	hub?: {
		role: HubAccessoryRole;
		on?: boolean;
		brightness?: number; // 0–100
		lastUpdatedAt?: number;
	};
	[key: string]: unknown;
}

// Minimal runtime “env” that accessory modules need from the platform
export interface HubAccessoryEnv {
	log: Logger;
	api: API;
	client: HubClient;
}

/**
 * HomeKit hands characteristic values over as CharacteristicValue; only
 * finite numbers make a usable brightness.
 */
export function clampBrightness(value: unknown): number | undefined {
	const n = typeof value === 'number' ? value : Number(value);
	if (typeof value === 'boolean' || value === null || value === '' || !Number.isFinite(n)) {
		return undefined;
	}
	return Math.max(0, Math.min(100, Math.round(n)));
}

export function getHubContext(accessory: PlatformAccessory, role: HubAccessoryRole): NonNullable<HubAccessoryContext['hub']> {
	const ctx = accessory.context as HubAccessoryContext;
	if (!ctx.hub || ctx.hub.role !== role) {
		ctx.hub = { role };
	}
	return ctx.hub;
}

/**
 * Populate the standard Accessory Information service from the hub summary.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	summary: HubSummary | null,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;

	infoService.updateCharacteristic(Characteristic.Name, accessory.displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'BT');

	if (!summary) {
		return;
	}

	infoService.updateCharacteristic(Characteristic.Model, summary.model);
	infoService.updateCharacteristic(Characteristic.SerialNumber, summary.serialNumber);
	infoService.updateCharacteristic(Characteristic.FirmwareRevision, summary.softwareVersion);
}

export function communicationFailure(env: HubAccessoryEnv, what: string, err: unknown): Error {
	env.log.warn('Home Hub: %s failed: %s', what, describeError(err));
	return new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
}
