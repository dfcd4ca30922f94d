import { EventEmitter } from 'node:events';

import type { PlatformAccessory, Service } from 'homebridge';
import { HomebridgeAPI } from 'homebridge/lib/api.js';
import { Logger } from 'homebridge/lib/logger.js';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { YeelightLanPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';
import { ColorMode, Device } from './yeelight/device.js';
import type { DeviceFields } from './yeelight/device.js';
import { DeviceConnection } from './yeelight/device-connection.js';
import type { ControlSocket } from './yeelight/device-connection.js';
import { DiscoveryTransport } from './yeelight/discovery-transport.js';
import type { MulticastSocket } from './yeelight/discovery-transport.js';
import type { YeelightLogger } from './yeelight/logger.js';

const REFRESH_MS = 60_000;

class IdleMulticastSocket extends EventEmitter implements MulticastSocket {
	public bind(_port: number, _address: string, callback: () => void): void {
		callback();
	}

	public addMembership(): void {
		// joined
	}

	public send(_msg: Uint8Array, _port: number, _address: string, callback: (error: Error | null) => void): void {
		callback(null);
	}

	public close(callback?: () => void): void {
		callback?.();
	}
}

class RecordingControlSocket extends EventEmitter implements ControlSocket {
	public destroyed = false;
	public written: string[] = [];

	public setEncoding(): void {
		// strings only
	}

	public write(data: string, callback: (err?: Error | null) => void): void {
		this.written.push(data);
		callback(null);
	}

	public destroy(): void {
		this.destroyed = true;
	}
}

function silentLogger(): YeelightLogger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

function makeBulb(overrides: Partial<DeviceFields> = {}): Device {
	return new Device({
		location: { address: '192.168.1.77', port: 55443 },
		id: '0x1',
		model: 'color',
		firmwareVersion: 18,
		supportedCommands: new Set(['set_power', 'set_bright', 'set_hsv', 'set_ct_abx']),
		power: 'on',
		brightness: 80,
		colorMode: ColorMode.Hsv,
		colorTemperature: 4000,
		rgb: { red: 255, green: 0, blue: 0 },
		hue: 120,
		saturation: 50,
		name: 'hall',
		...overrides,
	});
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
	let resolve: (value: T) => void = () => undefined;
	const promise = new Promise<T>((done) => {
		resolve = done;
	});
	return { promise, resolve };
}

// Every fake settles through microtasks; one macrotask turn drains them all
const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function lightbulbOf(api: HomebridgeAPI, accessory: PlatformAccessory | undefined): Service {
	const service = accessory?.getService(api.hap.Service.Lightbulb);
	if (!service) {
		throw new Error('accessory has no Lightbulb service');
	}
	return service;
}

async function setUp() {
	const transport = await DiscoveryTransport.create({
		createSocket: () => new IdleMulticastSocket(),
		logger: silentLogger(),
	});

	const create = vi.spyOn(DiscoveryTransport, 'create').mockResolvedValue(transport);
	const discover = vi.spyOn(transport, 'discover').mockResolvedValue([]);
	const close = vi.spyOn(transport, 'close');

	const openSocket = DeviceConnection.connect.bind(DeviceConnection);
	const controlSockets: RecordingControlSocket[] = [];
	const connect = vi.spyOn(DeviceConnection, 'connect').mockImplementation((location) => {
		const socket = new RecordingControlSocket();
		controlSockets.push(socket);
		const opening = openSocket(location, { createConnection: () => socket, logger: silentLogger() });
		socket.emit('connect');
		return opening;
	});

	const api = new HomebridgeAPI();
	const register = vi.spyOn(api, 'registerPlatformAccessories');
	const platform = new YeelightLanPlatform(
		Logger.withPrefix('YeelightLanTest'),
		{ platform: PLATFORM_NAME, discoveryTimeout: 100, refreshInterval: REFRESH_MS / 1000 },
		api,
	);

	return { api, platform, transport, create, discover, close, connect, controlSockets, register };
}

describe('YeelightLanPlatform', () => {
	beforeEach(() => {
		vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it('runs discovery at launch and again on every refresh tick', async () => {
		const { api, create, discover } = await setUp();

		api.signalFinished();
		await flush();

		expect(create).toHaveBeenCalledWith({ localPort: 7821, logger: expect.anything() });
		expect(discover).toHaveBeenCalledTimes(1);
		expect(discover).toHaveBeenCalledWith(100);

		vi.advanceTimersByTime(REFRESH_MS);
		await flush();

		expect(discover).toHaveBeenCalledTimes(2);
	});

	it('skips a refresh tick while the previous session is still running', async () => {
		const { api, discover } = await setUp();
		const slowSession = deferred<Device[]>();
		discover.mockResolvedValueOnce([]).mockReturnValueOnce(slowSession.promise);

		api.signalFinished();
		await flush();
		vi.advanceTimersByTime(REFRESH_MS);
		await flush();
		vi.advanceTimersByTime(REFRESH_MS);
		await flush();

		expect(discover).toHaveBeenCalledTimes(2);

		slowSession.resolve([]);
		await flush();
		vi.advanceTimersByTime(REFRESH_MS);
		await flush();

		expect(discover).toHaveBeenCalledTimes(3);
	});

	it('registers one Lightbulb accessory per discovered bulb', async () => {
		const { api, platform, discover, register } = await setUp();
		discover.mockResolvedValueOnce([makeBulb()]);

		api.signalFinished();
		await flush();

		expect(register).toHaveBeenCalledTimes(1);
		expect(platform.accessories).toHaveLength(1);

		const service = lightbulbOf(api, platform.accessories[0]);
		const { Characteristic } = api.hap;
		expect(service.getCharacteristic(Characteristic.On).value).toBe(true);
		expect(service.getCharacteristic(Characteristic.Brightness).value).toBe(80);
		expect(service.getCharacteristic(Characteristic.Hue).value).toBe(120);
		expect(service.getCharacteristic(Characteristic.Saturation).value).toBe(50);
	});

	it('updates the existing accessory when a later session sees the bulb again', async () => {
		const { api, platform, discover, register } = await setUp();
		discover
			.mockResolvedValueOnce([makeBulb()])
			.mockResolvedValueOnce([makeBulb({ power: 'off', brightness: 30 })]);

		api.signalFinished();
		await flush();
		vi.advanceTimersByTime(REFRESH_MS);
		await flush();

		expect(register).toHaveBeenCalledTimes(1);
		expect(platform.accessories).toHaveLength(1);

		const service = lightbulbOf(api, platform.accessories[0]);
		const { Characteristic } = api.hap;
		expect(service.getCharacteristic(Characteristic.On).value).toBe(false);
		expect(service.getCharacteristic(Characteristic.Brightness).value).toBe(30);
	});

	it('drops the cached control connection when a bulb moves', async () => {
		const { api, platform, discover, connect, controlSockets } = await setUp();
		discover
			.mockResolvedValueOnce([makeBulb()])
			.mockResolvedValueOnce([makeBulb({ location: { address: '192.168.1.78', port: 55443 } })]);

		api.signalFinished();
		await flush();

		const on = lightbulbOf(api, platform.accessories[0]).getCharacteristic(api.hap.Characteristic.On);
		on.setValue(false);
		await flush();

		expect(connect).toHaveBeenCalledTimes(1);
		expect(connect).toHaveBeenLastCalledWith({ address: '192.168.1.77', port: 55443 }, expect.anything());
		expect(controlSockets[0].written).toEqual(['{"id":1,"method":"set_power","params":["off","smooth",300]}\r\n']);

		vi.advanceTimersByTime(REFRESH_MS);
		await flush();

		expect(controlSockets[0].destroyed).toBe(true);

		on.setValue(true);
		await flush();

		expect(connect).toHaveBeenCalledTimes(2);
		expect(connect).toHaveBeenLastCalledWith({ address: '192.168.1.78', port: 55443 }, expect.anything());
		expect(controlSockets[1].written).toEqual(['{"id":1,"method":"set_power","params":["on","smooth",300]}\r\n']);
	});

	it('removes characteristics a bulb stops advertising support for', async () => {
		const { api, platform, discover } = await setUp();
		discover
			.mockResolvedValueOnce([makeBulb()])
			.mockResolvedValueOnce([makeBulb({ supportedCommands: new Set(['set_power', 'set_bright']) })]);

		api.signalFinished();
		await flush();

		const service = lightbulbOf(api, platform.accessories[0]);
		const { Characteristic } = api.hap;
		expect(service.testCharacteristic(Characteristic.ColorTemperature)).toBe(true);
		expect(service.testCharacteristic(Characteristic.Hue)).toBe(true);

		vi.advanceTimersByTime(REFRESH_MS);
		await flush();

		expect(service.testCharacteristic(Characteristic.ColorTemperature)).toBe(false);
		expect(service.testCharacteristic(Characteristic.Hue)).toBe(false);
		expect(service.testCharacteristic(Characteristic.Saturation)).toBe(false);
		expect(service.testCharacteristic(Characteristic.Brightness)).toBe(true);
	});

	it('closes a transport that finishes binding after shutdown', async () => {
		const { api, transport, create, discover, close } = await setUp();
		const binding = deferred<DiscoveryTransport>();
		create.mockReturnValueOnce(binding.promise);

		api.signalFinished();
		api.signalShutdown();
		binding.resolve(transport);
		await flush();

		expect(close).toHaveBeenCalledTimes(1);
		expect(discover).not.toHaveBeenCalled();
		expect(vi.getTimerCount()).toBe(0);
	});

	it('schedules no refresh when shutdown lands during the first session', async () => {
		const { api, platform, discover, close } = await setUp();
		const firstSession = deferred<Device[]>();
		discover.mockReturnValueOnce(firstSession.promise);

		api.signalFinished();
		await flush();
		api.signalShutdown();
		firstSession.resolve([makeBulb()]);
		await flush();

		expect(close).toHaveBeenCalledTimes(1);
		expect(platform.accessories).toHaveLength(0);
		expect(vi.getTimerCount()).toBe(0);
	});
});
