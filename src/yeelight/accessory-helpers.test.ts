import { describe, it, expect } from 'vitest';

import {
	CT_MAX_MIRED,
	displayNameFor,
	kelvinToMired,
	miredToKelvin,
	resolveCapabilities,
	rgbToHsv,
	stateFromDevice,
} from './accessory-helpers.js';
import { ColorMode, Device } from './device.js';
import type { DeviceFields } from './device.js';

function makeDevice(overrides: Partial<DeviceFields> = {}): Device {
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

describe('color conversions', () => {
	it('converts between mired and kelvin', () => {
		expect(miredToKelvin(370)).toBe(2703);
		expect(kelvinToMired(6500)).toBe(154);
		expect(kelvinToMired(4000)).toBe(250);
	});

	it('converts rgb to hsv', () => {
		expect(rgbToHsv(0, 255, 0)).toEqual({ h: 120, s: 100, v: 100 });
		expect(rgbToHsv(0, 0, 0)).toEqual({ h: 0, s: 0, v: 0 });
	});
});

describe('stateFromDevice', () => {
	it('takes hue and saturation from an HSV-mode bulb', () => {
		const state = stateFromDevice(makeDevice());

		expect(state).toEqual({
			deviceId: '0x1',
			location: { address: '192.168.1.77', port: 55443 },
			on: true,
			brightness: 80,
			hue: 120,
			saturation: 50,
			colorTemperature: 250,
			capabilities: {
				supportsPower: true,
				supportsBrightness: true,
				supportsColor: true,
				supportsCt: true,
			},
		});
	});

	it('derives hue and saturation from an RGB-mode bulb', () => {
		const state = stateFromDevice(makeDevice({ colorMode: ColorMode.Color, rgb: { red: 255, green: 0, blue: 0 } }));

		expect(state.hue).toBe(0);
		expect(state.saturation).toBe(100);
	});

	it('clamps a warm color temperature into the HomeKit range', () => {
		const state = stateFromDevice(makeDevice({ colorMode: ColorMode.ColorTemperature, colorTemperature: 1700 }));

		expect(state.colorTemperature).toBe(CT_MAX_MIRED);
	});

	it('keeps the previous color fields that the current mode does not report', () => {
		const previous = stateFromDevice(makeDevice({ hue: 200, saturation: 70 }));

		const next = stateFromDevice(
			makeDevice({ colorMode: ColorMode.ColorTemperature, colorTemperature: 5000, power: 'off' }),
			previous,
		);

		expect(next.hue).toBe(200);
		expect(next.saturation).toBe(70);
		expect(next.colorTemperature).toBe(200);
		expect(next.on).toBe(false);
	});
});

describe('resolveCapabilities', () => {
	it('gates features on the advertised commands', () => {
		const device = makeDevice({ supportedCommands: new Set(['set_power', 'set_rgb']) });

		expect(resolveCapabilities(device)).toEqual({
			supportsPower: true,
			supportsBrightness: false,
			supportsColor: true,
			supportsCt: false,
		});
	});
});

describe('displayNameFor', () => {
	it('uses the bulb name when set', () => {
		expect(displayNameFor(makeDevice({ name: ' hall ' }))).toBe('hall');
	});

	it('falls back to model and id', () => {
		expect(displayNameFor(makeDevice({ name: '' }))).toBe('Yeelight color 0x1');
	});
});
