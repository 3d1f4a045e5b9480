// src/hub/hub-light-accessory.ts
import type { PlatformAccessory, Service } from 'homebridge';

import type { HubSummary } from './hub-client.js';
import type { HubAccessoryEnv } from './hub-accessory-helpers.js';
import {
	applyAccessoryInformation,
	clampBrightness,
	communicationFailure,
	getHubContext,
} from './hub-accessory-helpers.js';

/**
 * Expose the hub's status light as a dimmable Lightbulb. Reads answer from
 * the cached state the platform poll keeps fresh; writes go to the hub.
 */
export function configureHubLightAccessory(
	env: HubAccessoryEnv,
	accessory: PlatformAccessory,
	summary: HubSummary | null,
): Service {
	const service =
		accessory.getService(env.api.hap.Service.Lightbulb) ||
		accessory.addService(env.api.hap.Service.Lightbulb, accessory.displayName);

	if (accessory.category !== env.api.hap.Categories.LIGHTBULB) {
		accessory.category = env.api.hap.Categories.LIGHTBULB;
	}

	applyAccessoryInformation(env.api, accessory, summary);

	const state = getHubContext(accessory, 'light');
	const Characteristic = env.api.hap.Characteristic;

	// ----- On/Off -----
	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => {
			const currentOn = !!state.on;
			env.log.debug('Home Hub: Light On.get -> %s', String(currentOn));
			return currentOn;
		})
		.onSet(async (value) => {
			const on = value === true || value === 1;

			env.log.info('Home Hub: Light On.set -> %s', on ? 'ON' : 'OFF');

			try {
				await env.client.lightEnable(on);
			} catch (err) {
				throw communicationFailure(env, 'Light On.set', err);
			}

			state.on = on;
			state.lastUpdatedAt = Date.now();
		});

	// ----- Brightness -----
	service
		.getCharacteristic(Characteristic.Brightness)
		.onGet(() => {
			if (typeof state.brightness === 'number') {
				return state.brightness;
			}
			return state.on ? 100 : 0;
		})
		.onSet(async (value) => {
			const brightness = clampBrightness(value);

			if (brightness === undefined) {
				env.log.warn('Home Hub: Light Brightness.set received invalid value=%o', value);
				return;
			}

			env.log.info('Home Hub: Light Brightness.set -> %d', brightness);

			try {
				await env.client.lightBrightnessSet(brightness);
			} catch (err) {
				throw communicationFailure(env, 'Light Brightness.set', err);
			}

			state.brightness = brightness;
			state.lastUpdatedAt = Date.now();
		});

	return service;
}
