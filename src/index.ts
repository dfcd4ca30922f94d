import type { API } from 'homebridge';

import { YeelightLanPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * Homebridge entry point.
 * Registers the YeelightLanPlatform with Homebridge under PLATFORM_NAME.
 */
export default (api: API) => {
	api.registerPlatform(PLATFORM_NAME, YeelightLanPlatform);
};

export { Device, ColorMode } from './yeelight/device.js';
export type { DeviceLocation, PowerState, Rgb } from './yeelight/device.js';
export { DiscoveryTransport } from './yeelight/discovery-transport.js';
export type { DiscoveryTransportOptions, MulticastSocket } from './yeelight/discovery-transport.js';
export { DeviceConnection } from './yeelight/device-connection.js';
export { decodeDevice } from './yeelight/device-decoder.js';
export { parseResponse } from './yeelight/response-parser.js';
export { DedupeCollector } from './yeelight/dedupe-collector.js';
export * from './yeelight/errors.js';
