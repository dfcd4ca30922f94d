// src/yeelight/light-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { Device } from './device.js';
import type { DeviceConnection } from './device-connection.js';
import type { YeelightAccessoryEnv, YeelightLightState } from './accessory-helpers.js';
import {
	CT_MAX_MIRED,
	CT_MIN_MIRED,
	applyAccessoryInformation,
	displayNameFor,
	miredToKelvin,
} from './accessory-helpers.js';
import { describeError } from './logger.js';

function clampNumber(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

/**
 * Push the cached state into every characteristic the bulb exposes.
 * Used after each discovery session so HomeKit follows changes made
 * from other apps.
 */
export function refreshYeelightLightAccessory(
	env: YeelightAccessoryEnv,
	accessory: PlatformAccessory,
	state: YeelightLightState,
): void {
	const service = accessory.getService(env.api.hap.Service.Lightbulb);
	if (!service) {
		return;
	}

	const Characteristic = env.api.hap.Characteristic;

	service.updateCharacteristic(Characteristic.On, state.on);
	if (state.capabilities.supportsBrightness) {
		service.updateCharacteristic(Characteristic.Brightness, state.brightness);
	}
	if (state.capabilities.supportsColor) {
		service.updateCharacteristic(Characteristic.Hue, state.hue);
		service.updateCharacteristic(Characteristic.Saturation, state.saturation);
	}
	if (state.capabilities.supportsCt) {
		service.updateCharacteristic(Characteristic.ColorTemperature, state.colorTemperature);
	}
}

export function configureYeelightLightAccessory(
	env: YeelightAccessoryEnv,
	device: Device,
	accessory: PlatformAccessory,
	state: YeelightLightState,
): void {
	const deviceName = displayNameFor(device);
	const deviceId = device.id;

	const service =
		accessory.getService(env.api.hap.Service.Lightbulb) ||
		accessory.addService(env.api.hap.Service.Lightbulb, deviceName);

	if (accessory.category !== env.api.hap.Categories.LIGHTBULB) {
		accessory.category = env.api.hap.Categories.LIGHTBULB;
	}

	applyAccessoryInformation(env.api, accessory, device);

	const Characteristic = env.api.hap.Characteristic;

	// Every write funnels through here: lazy connect, send, mark seen.
	const sendCommand = async (
		label: string,
		command: (connection: DeviceConnection) => Promise<number>,
	): Promise<void> => {
		try {
			const connection = await env.getConnection(state);
			await command(connection);
			env.markDeviceSeen(deviceId);
		} catch (err) {
			env.log.warn(
				'Yeelight: %s failed for %s (deviceId=%s): %s',
				label,
				deviceName,
				deviceId,
				describeError(err),
			);

			throw new env.api.hap.HapStatusError(
				env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
			);
		}
	};

	const logOfflineRead = (label: string, value: number | boolean): void => {
		if (env.isDeviceProbablyOffline(deviceId)) {
			env.log.debug(
				'Yeelight: %s.get offline-heuristic hit; returning cached=%s for %s (deviceId=%s)',
				label,
				String(value),
				deviceName,
				deviceId,
			);
		}
	};

	// ----- On/Off -----
	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => {
			logOfflineRead('On', state.on);
			return state.on;
		})
		.onSet(async (value) => {
			const on = value === true || value === 1;

			env.log.info('Yeelight: On.set -> %s for %s (deviceId=%s)', String(on), deviceName, deviceId);

			// Optimistic cache; the next discovery session confirms
			state.on = on;
			await sendCommand('On.set', (connection) => connection.setPower(on));
		});

	// ----- Brightness -----
	if (state.capabilities.supportsBrightness) {
		service
			.getCharacteristic(Characteristic.Brightness)
			.onGet(() => {
				logOfflineRead('Brightness', state.brightness);
				return state.brightness;
			})
			.onSet(async (value) => {
				const brightness = clampNumber(Number(value), 0, 100);
				if (!Number.isFinite(brightness)) {
					env.log.warn(
						'Yeelight: Brightness.set received invalid value=%o for %s (deviceId=%s)',
						value,
						deviceName,
						deviceId,
					);
					return;
				}

				env.log.info('Yeelight: Brightness.set -> %d for %s (deviceId=%s)', brightness, deviceName, deviceId);

				state.brightness = brightness;
				state.on = brightness > 0;

				// The bulb has no brightness 0; HomeKit uses it to mean off
				await sendCommand('Brightness.set', (connection) =>
					brightness > 0 ? connection.setBrightness(brightness) : connection.setPower(false));
			});
	} else if (service.testCharacteristic(Characteristic.Brightness)) {
		service.removeCharacteristic(service.getCharacteristic(Characteristic.Brightness));
	}

	// ----- Hue / Saturation -----
	if (state.capabilities.supportsColor) {
		service
			.getCharacteristic(Characteristic.Hue)
			.onGet(() => {
				logOfflineRead('Hue', state.hue);
				return state.hue;
			})
			.onSet(async (value) => {
				const hue = clampNumber(Number(value), 0, 360);
				if (!Number.isFinite(hue)) {
					env.log.warn('Yeelight: Hue.set received invalid value=%o for %s', value, deviceName);
					return;
				}

				env.log.info(
					'Yeelight: Hue.set -> %d (saturation=%d) for %s (deviceId=%s)',
					hue,
					state.saturation,
					deviceName,
					deviceId,
				);

				state.hue = hue;
				await sendCommand('Hue.set', (connection) => connection.setHsv(hue, state.saturation));
			});

		service
			.getCharacteristic(Characteristic.Saturation)
			.onGet(() => {
				logOfflineRead('Saturation', state.saturation);
				return state.saturation;
			})
			.onSet(async (value) => {
				const saturation = clampNumber(Number(value), 0, 100);
				if (!Number.isFinite(saturation)) {
					env.log.warn('Yeelight: Saturation.set received invalid value=%o for %s', value, deviceName);
					return;
				}

				env.log.info(
					'Yeelight: Saturation.set -> %d (hue=%d) for %s (deviceId=%s)',
					saturation,
					state.hue,
					deviceName,
					deviceId,
				);

				state.saturation = saturation;
				await sendCommand('Saturation.set', (connection) => connection.setHsv(state.hue, saturation));
			});
	} else {
		if (service.testCharacteristic(Characteristic.Hue)) {
			service.removeCharacteristic(service.getCharacteristic(Characteristic.Hue));
		}
		if (service.testCharacteristic(Characteristic.Saturation)) {
			service.removeCharacteristic(service.getCharacteristic(Characteristic.Saturation));
		}
	}

	// ----- Color Temperature -----
	if (state.capabilities.supportsCt) {
		service
			.getCharacteristic(Characteristic.ColorTemperature)
			.setProps({
				minValue: CT_MIN_MIRED,
				maxValue: CT_MAX_MIRED,
				minStep: 1,
			})
			.onGet(() => {
				logOfflineRead('ColorTemperature', state.colorTemperature);
				return state.colorTemperature;
			})
			.onSet(async (value) => {
				const mired = clampNumber(Number(value), CT_MIN_MIRED, CT_MAX_MIRED);
				if (!Number.isFinite(mired)) {
					env.log.warn('Yeelight: ColorTemperature.set received invalid value=%o for %s', value, deviceName);
					return;
				}

				const kelvin = miredToKelvin(mired);

				env.log.info(
					'Yeelight: ColorTemperature.set -> %d mired (~%dK) for %s (deviceId=%s)',
					mired,
					kelvin,
					deviceName,
					deviceId,
				);

				state.colorTemperature = mired;
				await sendCommand('ColorTemperature.set', (connection) => connection.setColorTemperature(kelvin));
			});
	} else if (service.testCharacteristic(Characteristic.ColorTemperature)) {
		service.removeCharacteristic(service.getCharacteristic(Characteristic.ColorTemperature));
	}

	refreshYeelightLightAccessory(env, accessory, state);
}
