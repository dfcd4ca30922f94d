// src/yeelight/accessory-helpers.ts
import type {
	API,
	Logging,
	PlatformAccessory,
} from 'homebridge';

import { ColorMode } from './device.js';
import type { Device, DeviceLocation } from './device.js';
import type { DeviceConnection } from './device-connection.js';

// HomeKit's tunable-white window, in mireds (~6500K to 2000K)
export const CT_MIN_MIRED = 154;
export const CT_MAX_MIRED = 500;

export interface YeelightCapabilityProfile {
	supportsPower: boolean;
	supportsBrightness: boolean;
	supportsColor: boolean;
	supportsCt: boolean;
}

/**
 * Last known state of one bulb as HomeKit sees it. Seeded from discovery,
 * updated optimistically on writes and refreshed on every later session.
 */
export interface YeelightLightState {
	deviceId: string;
	location: DeviceLocation;
	on: boolean;
	brightness: number; // 0–100
	hue: number; // 0–360
	saturation: number; // 0–100
	colorTemperature: number; // mireds
	capabilities: YeelightCapabilityProfile;
}

// Minimal runtime “env” that accessory modules need from the platform
export interface YeelightAccessoryEnv {
	log: Logging;
	api: API;

	getConnection(state: YeelightLightState): Promise<DeviceConnection>;
	isDeviceProbablyOffline(deviceId: string): boolean;
	markDeviceSeen(deviceId: string): void;
}

function clampNumber(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

/**
 * Color Temperature Converters: Convert HomeKit mired values to Kelvin
 */
export function miredToKelvin(mired: number): number {
	const m = clampNumber(Number(mired), 1, 1_000_000);
	return Math.round(1_000_000 / m);
}

/**
 * Color Temperature Converters: Convert Kelvin to HomeKit mired values
 */
export function kelvinToMired(kelvin: number): number {
	const k = clampNumber(Number(kelvin), 1, 1_000_000);
	return Math.round(1_000_000 / k);
}

/**
 * RGB→HSV Converter: lets HomeKit show Hue/Saturation for bulbs in RGB mode
 */
export function rgbToHsv(r: number, g: number, b: number): { h: number; s: number; v: number } {
	const rn = clampNumber(r, 0, 255) / 255;
	const gn = clampNumber(g, 0, 255) / 255;
	const bn = clampNumber(b, 0, 255) / 255;

	const max = Math.max(rn, gn, bn);
	const min = Math.min(rn, gn, bn);
	const delta = max - min;

	let h = 0;
	if (delta !== 0) {
		if (max === rn) {
			h = ((gn - bn) / delta) % 6;
		} else if (max === gn) {
			h = (bn - rn) / delta + 2;
		} else {
			h = (rn - gn) / delta + 4;
		}
		h *= 60;
		if (h < 0) {
			h += 360;
		}
	}

	const s = max === 0 ? 0 : (delta / max) * 100;
	const v = max * 100;

	return {
		h: clampNumber(h, 0, 360),
		s: clampNumber(s, 0, 100),
		v: clampNumber(v, 0, 100),
	};
}

export function resolveCapabilities(device: Device): YeelightCapabilityProfile {
	return {
		supportsPower: device.supports('set_power'),
		supportsBrightness: device.supports('set_bright'),
		supportsColor: device.supports('set_hsv') || device.supports('set_rgb'),
		supportsCt: device.supports('set_ct_abx'),
	};
}

export function sameCapabilities(a: YeelightCapabilityProfile, b: YeelightCapabilityProfile): boolean {
	return (
		a.supportsPower === b.supportsPower &&
		a.supportsBrightness === b.supportsBrightness &&
		a.supportsColor === b.supportsColor &&
		a.supportsCt === b.supportsCt
	);
}

/**
 * Map a discovery snapshot onto HomeKit units.
 *
 * Only the fields that belong to the bulb's current color mode are
 * trusted; the others keep whatever `previous` held.
 */
export function stateFromDevice(device: Device, previous?: YeelightLightState): YeelightLightState {
	let hue = previous?.hue ?? 0;
	let saturation = previous?.saturation ?? 0;
	let colorTemperature = previous?.colorTemperature ?? kelvinToMired(4000);

	switch (device.colorMode) {
	case ColorMode.Hsv:
		hue = clampNumber(device.hue, 0, 360);
		saturation = clampNumber(device.saturation, 0, 100);
		break;
	case ColorMode.Color: {
		const hsv = rgbToHsv(device.rgb.red, device.rgb.green, device.rgb.blue);
		hue = Math.round(hsv.h);
		saturation = Math.round(hsv.s);
		break;
	}
	case ColorMode.ColorTemperature:
		colorTemperature = clampNumber(kelvinToMired(device.colorTemperature), CT_MIN_MIRED, CT_MAX_MIRED);
		break;
	}

	return {
		deviceId: device.id,
		location: { ...device.location },
		on: device.power === 'on',
		brightness: clampNumber(device.brightness, 0, 100),
		hue,
		saturation,
		colorTemperature,
		capabilities: resolveCapabilities(device),
	};
}

export function displayNameFor(device: Device): string {
	const name = device.name.trim();
	return name.length > 0 ? name : `Yeelight ${device.model} ${device.id}`;
}

/**
 * Populate the standard Accessory Information service from the advertisement.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	device: Device,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const firmware = String(device.firmwareVersion);

	infoService.updateCharacteristic(Characteristic.Name, displayNameFor(device));
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Yeelight');
	infoService.updateCharacteristic(Characteristic.Model, device.model);
	infoService.updateCharacteristic(Characteristic.SerialNumber, device.id);
	infoService.updateCharacteristic(Characteristic.FirmwareRevision, firmware);
	infoService.updateCharacteristic(Characteristic.SoftwareRevision, firmware);
}
