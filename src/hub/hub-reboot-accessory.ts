// src/hub/hub-reboot-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { HubSummary } from './hub-client.js';
import type { HubAccessoryEnv } from './hub-accessory-helpers.js';
import {
	applyAccessoryInformation,
	communicationFailure,
} from './hub-accessory-helpers.js';

const SWITCH_RESET_MS = 1_000;

export function configureHubRebootAccessory(
	env: HubAccessoryEnv,
	accessory: PlatformAccessory,
	summary: HubSummary | null,
): void {
	const service =
		accessory.getService(env.api.hap.Service.Switch) ||
		accessory.addService(env.api.hap.Service.Switch, accessory.displayName);

	applyAccessoryInformation(env.api, accessory, summary);

	const On = env.api.hap.Characteristic.On;

	// Momentary: always reads off, flips back after a press.
	service
		.getCharacteristic(On)
		.onGet(() => false)
		.onSet(async (value) => {
			if (value !== true && value !== 1) {
				return;
			}

			env.log.warn('Home Hub: reboot requested from HomeKit');

			try {
				await env.client.reboot();
			} catch (err) {
				throw communicationFailure(env, 'Reboot', err);
			} finally {
				setTimeout(() => service.updateCharacteristic(On, false), SWITCH_RESET_MS);
			}
		});
}
