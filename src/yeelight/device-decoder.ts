// src/yeelight/device-decoder.ts

import { ColorMode, Device } from './device.js';
import type { DeviceLocation, PowerState, Rgb } from './device.js';
import { FieldInvalidError, FieldMissingError } from './errors.js';

export type HeaderSource = ReadonlyMap<string, string>;

/** Returns the parsed value, or undefined when the raw text is not acceptable. */
export type FieldParser<T> = (raw: string) => T | undefined;

const U8_MAX = 0xff;
const U16_MAX = 0xffff;
const U24_MAX = 0xffffff;

/**
 * Numeric `color_mode` codes as the bulbs report them.
 * Anything outside this table is rejected rather than guessed.
 */
export const COLOR_MODE_CODES: Readonly<Record<string, ColorMode>> = {
	'1': ColorMode.Color,
	'2': ColorMode.ColorTemperature,
	'3': ColorMode.Hsv,
};

/**
 * Look up one named field and run it through `parse`.
 * Missing and unparseable fields raise errors that carry the field name.
 */
export function requireField<T>(headers: HeaderSource, fieldName: string, parse: FieldParser<T>): T {
	const raw = headers.get(fieldName);
	if (raw === undefined) {
		throw new FieldMissingError(fieldName);
	}

	const value = parse(raw);
	if (value === undefined) {
		throw new FieldInvalidError(fieldName, raw);
	}
	return value;
}

export const parseText: FieldParser<string> = (raw) => raw;

export function unsignedInteger(max: number): FieldParser<number> {
	return (raw) => {
		if (!/^[0-9]+$/.test(raw)) {
			return undefined;
		}
		const value = Number(raw);
		return value <= max ? value : undefined;
	};
}

export const parseU8 = unsignedInteger(U8_MAX);
export const parseU16 = unsignedInteger(U16_MAX);

export const parsePower: FieldParser<PowerState> = (raw) =>
	raw === 'on' || raw === 'off' ? raw : undefined;

export const parseColorMode: FieldParser<ColorMode> = (raw) =>
	Object.prototype.hasOwnProperty.call(COLOR_MODE_CODES, raw) ? COLOR_MODE_CODES[raw] : undefined;

export const parseRgb: FieldParser<Rgb> = (raw) => {
	const packed = unsignedInteger(U24_MAX)(raw);
	if (packed === undefined) {
		return undefined;
	}
	return {
		red: (packed >> 16) & 0xff,
		green: (packed >> 8) & 0xff,
		blue: packed & 0xff,
	};
};

export const parseSupport: FieldParser<Set<string>> = (raw) =>
	new Set(raw.split(/\s+/).filter((token) => token.length > 0));

/**
 * Build a Device from one advertisement's headers.
 *
 * Fields are checked in a fixed order and the first failure aborts the
 * decode, so a Device is either complete or never constructed. `location`
 * comes from the transport, not from the headers.
 */
export function decodeDevice(headers: HeaderSource, location: DeviceLocation): Device {
	const id = requireField(headers, 'id', parseText);
	const model = requireField(headers, 'model', parseText);
	const firmwareVersion = requireField(headers, 'fw_ver', parseU8);
	const power = requireField(headers, 'power', parsePower);
	const supportedCommands = requireField(headers, 'support', parseSupport);
	const brightness = requireField(headers, 'bright', parseU8);
	const colorMode = requireField(headers, 'color_mode', parseColorMode);
	const colorTemperature = requireField(headers, 'ct', parseU16);
	const rgb = requireField(headers, 'rgb', parseRgb);
	const hue = requireField(headers, 'hue', parseU16);
	const saturation = requireField(headers, 'sat', parseU8);
	const name = requireField(headers, 'name', parseText);

	return new Device({
		location,
		id,
		model,
		firmwareVersion,
		supportedCommands,
		power,
		brightness,
		colorMode,
		colorTemperature,
		rgb,
		hue,
		saturation,
		name,
	});
}
