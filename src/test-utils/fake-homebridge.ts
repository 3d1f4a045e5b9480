// src/test-utils/fake-homebridge.ts
// In-process stand-ins for the parts of the Homebridge API the plugin touches.
import { EventEmitter } from 'node:events';
import { format } from 'node:util';
import type { API, Logger, PlatformAccessory } from 'homebridge';

import type { HubAccessoryContext } from '../hub/hub-accessory-helpers.js';

export const COMMUNICATION_FAILURE = -70402;

export class FakeCharacteristic {
	private getHandler: (() => unknown) | undefined;
	private setHandler: ((value: unknown) => unknown) | undefined;

	public constructor(public readonly name: string) {}

	public onGet(handler: () => unknown): this {
		this.getHandler = handler;
		return this;
	}

	public onSet(handler: (value: unknown) => unknown): this {
		this.setHandler = handler;
		return this;
	}

	public async get(): Promise<unknown> {
		if (!this.getHandler) {
			throw new Error(`FakeCharacteristic: ${this.name} has no get handler`);
		}
		return this.getHandler();
	}

	public async set(value: unknown): Promise<void> {
		if (!this.setHandler) {
			throw new Error(`FakeCharacteristic: ${this.name} has no set handler`);
		}
		await this.setHandler(value);
	}
}

export class FakeService {
	public readonly updates: Array<[string, unknown]> = [];
	private readonly characteristics = new Map<string, FakeCharacteristic>();

	public constructor(public readonly type: string, public readonly displayName: string) {}

	public getCharacteristic(name: string): FakeCharacteristic {
		let characteristic = this.characteristics.get(name);
		if (!characteristic) {
			characteristic = new FakeCharacteristic(name);
			this.characteristics.set(name, characteristic);
		}
		return characteristic;
	}

	public updateCharacteristic(name: string, value: unknown): this {
		this.updates.push([name, value]);
		return this;
	}

	/** Last value pushed for a characteristic. */
	public value(name: string): unknown {
		const last = this.updates.filter(([key]) => key === name).pop();
		return last?.[1];
	}
}

export class FakeAccessory {
	public context: HubAccessoryContext = {};
	public category = 1;
	private readonly services = new Map<string, FakeService>();

	public constructor(public readonly displayName: string, public readonly UUID: string) {
		this.services.set('AccessoryInformation', new FakeService('AccessoryInformation', displayName));
	}

	public getService(type: string): FakeService | undefined {
		return this.services.get(type);
	}

	public addService(type: string, name: string): FakeService {
		const service = new FakeService(type, name);
		this.services.set(type, service);
		return service;
	}

	public service(type: string): FakeService {
		const service = this.services.get(type);
		if (!service) {
			throw new Error(`FakeAccessory: ${this.displayName} has no ${type} service`);
		}
		return service;
	}
}

export class FakeHapStatusError extends Error {
	public constructor(public readonly hapStatus: number) {
		super(`HAP status ${hapStatus}`);
	}
}

const hap = {
	Service: {
		AccessoryInformation: 'AccessoryInformation',
		Lightbulb: 'Lightbulb',
		Switch: 'Switch',
	},
	Characteristic: {
		Name: 'Name',
		Manufacturer: 'Manufacturer',
		Model: 'Model',
		SerialNumber: 'SerialNumber',
		FirmwareRevision: 'FirmwareRevision',
		On: 'On',
		Brightness: 'Brightness',
	},
	Categories: { LIGHTBULB: 5 },
	HAPStatus: { SERVICE_COMMUNICATION_FAILURE: COMMUNICATION_FAILURE },
	HapStatusError: FakeHapStatusError,
	uuid: { generate: (data: string) => `uuid:${data}` },
};

export class FakeApi extends EventEmitter {
	public readonly hap = hap;
	public readonly platformAccessory = FakeAccessory;
	public readonly registered: FakeAccessory[] = [];
	public readonly unregistered: FakeAccessory[] = [];

	public registerPlatformAccessories(_plugin: string, _platform: string, accessories: FakeAccessory[]): void {
		this.registered.push(...accessories);
	}

	public unregisterPlatformAccessories(_plugin: string, _platform: string, accessories: FakeAccessory[]): void {
		this.unregistered.push(...accessories);
	}

	public accessory(displayName: string): FakeAccessory {
		const accessory = this.registered.find((acc) => acc.displayName === displayName);
		if (!accessory) {
			throw new Error(`FakeApi: ${displayName} was not registered`);
		}
		return accessory;
	}
}

export class FakeLogger {
	public readonly lines: Array<{ level: string; message: string }> = [];

	public debug(message: string, ...params: unknown[]): void {
		this.record('debug', message, params);
	}

	public info(message: string, ...params: unknown[]): void {
		this.record('info', message, params);
	}

	public warn(message: string, ...params: unknown[]): void {
		this.record('warn', message, params);
	}

	public error(message: string, ...params: unknown[]): void {
		this.record('error', message, params);
	}

	public messages(level: string): string[] {
		return this.lines.filter((line) => line.level === level).map((line) => line.message);
	}

	private record(level: string, message: string, params: unknown[]): void {
		this.lines.push({ level, message: format(message, ...params) });
	}
}

// The fakes implement only what the plugin calls, so they stand in for
// Homebridge's much wider types here.
export function asApi(api: FakeApi): API {
	return api as unknown as API;
}

export function asLogger(log: FakeLogger): Logger {
	return log as unknown as Logger;
}

export function asAccessory(accessory: FakeAccessory): PlatformAccessory {
	return accessory as unknown as PlatformAccessory;
}
