// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logging,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import type { Device } from './yeelight/device.js';
import { DeviceConnection } from './yeelight/device-connection.js';
import { DiscoveryTransport } from './yeelight/discovery-transport.js';
import { describeError } from './yeelight/logger.js';
import type { YeelightLogger } from './yeelight/logger.js';
import { resolvePlatformConfig } from './yeelight/platform-config.js';
import type { YeelightPlatformSettings } from './yeelight/platform-config.js';
import {
	type YeelightAccessoryEnv,
	type YeelightLightState,
	displayNameFor,
	sameCapabilities,
	stateFromDevice,
} from './yeelight/accessory-helpers.js';
import {
	configureYeelightLightAccessory,
	refreshYeelightLightAccessory,
} from './yeelight/light-accessory.js';

const toYeelightLogger = (log: Logging): YeelightLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class YeelightLanPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logging;
	private readonly api: API;
	private readonly settings: YeelightPlatformSettings;
	private readonly yeelightLog: YeelightLogger;
	private readonly accessoryEnv: YeelightAccessoryEnv;

	private transport: DiscoveryTransport | null = null;
	private discovering = false;
	private shuttingDown = false;
	private refreshTimer: NodeJS.Timeout | null = null;

	private readonly deviceIdToAccessory = new Map<string, PlatformAccessory>();
	private readonly deviceStates = new Map<string, YeelightLightState>();
	private readonly deviceLastSeen = new Map<string, number>();
	private readonly connections = new Map<string, Promise<DeviceConnection>>();

	private readonly offlineTimeoutMs = 30 * 60 * 1000;

	private markDeviceSeen(deviceId: string): void {
		this.deviceLastSeen.set(deviceId, Date.now());
	}

	private isDeviceProbablyOffline(deviceId: string): boolean {
		const last = this.deviceLastSeen.get(deviceId);
		if (!last) {
			// No data yet; treat as online until we know better
			return false;
		}
		return Date.now() - last > this.offlineTimeoutMs;
	}

	/**
	 * Lazily open (or reuse) the control stream for a bulb. A failed or
	 * closed connection is forgotten so the next write opens a fresh one.
	 */
	private getConnection(state: YeelightLightState): Promise<DeviceConnection> {
		const pending = this.connections.get(state.deviceId);
		if (pending) {
			return pending.then((connection) => {
				if (connection.isOpen) {
					return connection;
				}
				this.connections.delete(state.deviceId);
				return this.getConnection(state);
			});
		}

		const opening = DeviceConnection.connect(state.location, { logger: this.yeelightLog });
		this.connections.set(state.deviceId, opening);
		void opening.catch(() => {
			if (this.connections.get(state.deviceId) === opening) {
				this.connections.delete(state.deviceId);
			}
		});
		return opening;
	}

	private dropConnection(deviceId: string): void {
		const pending = this.connections.get(deviceId);
		if (!pending) {
			return;
		}
		this.connections.delete(deviceId);
		void pending.then(
			(connection) => connection.close(),
			(err) => this.log.debug('Yeelight: discarded failed connection for %s: %s', deviceId, describeError(err)),
		);
	}

	constructor(log: Logging, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;
		this.yeelightLog = toYeelightLogger(this.log);
		this.settings = resolvePlatformConfig(config, this.yeelightLog);

		this.accessoryEnv = {
			log: this.log,
			api: this.api,
			getConnection: this.getConnection.bind(this),
			isDeviceProbablyOffline: this.isDeviceProbablyOffline.bind(this),
			markDeviceSeen: this.markDeviceSeen.bind(this),
		};

		this.log.info(this.settings.name, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.start();
		});

		this.api.on('shutdown', () => {
			void this.shutdown();
		});
	}

	private async start(): Promise<void> {
		let transport: DiscoveryTransport;
		try {
			transport = await DiscoveryTransport.create({
				localPort: this.settings.localPort,
				logger: this.yeelightLog,
			});
		} catch (err) {
			this.log.error('Yeelight: discovery setup failed: %s', describeError(err));
			return;
		}

		// Homebridge may have shut down while the socket was being bound
		if (this.shuttingDown) {
			await this.closeTransport(transport);
			return;
		}
		this.transport = transport;

		await this.runDiscovery();

		if (this.shuttingDown) {
			return;
		}

		if (this.settings.refreshIntervalMs > 0) {
			this.refreshTimer = setInterval(() => {
				void this.runDiscovery();
			}, this.settings.refreshIntervalMs);
		}
	}

	private async shutdown(): Promise<void> {
		this.shuttingDown = true;

		if (this.refreshTimer) {
			clearInterval(this.refreshTimer);
			this.refreshTimer = null;
		}

		for (const deviceId of [...this.connections.keys()]) {
			this.dropConnection(deviceId);
		}

		if (this.transport) {
			const transport = this.transport;
			this.transport = null;
			await this.closeTransport(transport);
		}
	}

	private async closeTransport(transport: DiscoveryTransport): Promise<void> {
		try {
			await transport.close();
		} catch (err) {
			this.log.debug('Yeelight: closing discovery socket failed: %s', describeError(err));
		}
	}

	private async runDiscovery(): Promise<void> {
		const transport = this.transport;
		if (!transport || this.discovering) {
			return;
		}

		this.discovering = true;
		try {
			const devices = await transport.discover(this.settings.discoveryTimeoutMs);
			this.log.debug('Yeelight: discovery returned %d device(s)', devices.length);
			if (this.shuttingDown) {
				return;
			}

			for (const device of devices) {
				this.registerDevice(device);
			}
		} catch (err) {
			this.log.error('Yeelight: discovery failed: %s', describeError(err));
		} finally {
			this.discovering = false;
		}
	}

	private registerDevice(device: Device): void {
		this.markDeviceSeen(device.id);

		const known = this.deviceStates.get(device.id);
		const knownAccessory = this.deviceIdToAccessory.get(device.id);
		if (known && knownAccessory) {
			const moved =
				known.location.address !== device.location.address ||
				known.location.port !== device.location.port;
			if (moved) {
				this.log.info(
					'Yeelight: %s moved to %s:%d',
					device.id,
					device.location.address,
					device.location.port,
				);
				this.dropConnection(device.id);
			}

			const next = stateFromDevice(device, known);
			const capabilitiesChanged = !sameCapabilities(known.capabilities, next.capabilities);

			// Handlers hold on to this object, so update it in place
			Object.assign(known, next);

			if (capabilitiesChanged) {
				this.log.info('Yeelight: %s changed its supported commands; reconfiguring', device.id);
				configureYeelightLightAccessory(this.accessoryEnv, device, knownAccessory, known);
			} else {
				refreshYeelightLightAccessory(this.accessoryEnv, knownAccessory, known);
			}
			return;
		}

		const deviceName = displayNameFor(device);
		const uuidSeed = `yeelight-${device.id}`;
		const uuid = this.api.hap.uuid.generate(uuidSeed);

		let accessory = this.accessories.find(acc => acc.UUID === uuid);

		if (accessory) {
			this.log.info('Yeelight: using cached accessory for %s (%s)', deviceName, uuidSeed);
		} else {
			this.log.info('Yeelight: registering new accessory for %s (%s)', deviceName, uuidSeed);

			accessory = new this.api.platformAccessory(deviceName, uuid);

			this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);

			this.accessories.push(accessory);
		}

		const state = stateFromDevice(device);
		this.deviceStates.set(device.id, state);
		this.deviceIdToAccessory.set(device.id, accessory);

		this.log.info(
			'Yeelight: configuring %s as Lightbulb (model=%s, deviceId=%s, %s:%d)',
			deviceName,
			device.model,
			device.id,
			device.location.address,
			device.location.port,
		);

		configureYeelightLightAccessory(this.accessoryEnv, device, accessory, state);
	}
}
