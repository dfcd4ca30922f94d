// src/yeelight/platform-config.ts

import type { YeelightLogger } from './logger.js';
import { DEFAULT_LOCAL_PORT } from './discovery-transport.js';

export interface YeelightPlatformSettings {
	name: string;
	discoveryTimeoutMs: number;
	localPort: number;
	/** 0 disables periodic discovery after launch. */
	refreshIntervalMs: number;
}

export const DEFAULT_PLATFORM_SETTINGS: Readonly<YeelightPlatformSettings> = {
	name: 'Yeelight',
	discoveryTimeoutMs: 2_000,
	localPort: DEFAULT_LOCAL_PORT,
	refreshIntervalMs: 60_000,
};

function readInteger(
	raw: Readonly<Record<string, unknown>>,
	key: string,
	fallback: number,
	min: number,
	max: number,
	log: YeelightLogger,
): number {
	const value = raw[key];
	if (value === undefined || value === null) {
		return fallback;
	}

	if (typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max) {
		return value;
	}

	log.warn(
		'Yeelight: config "%s" must be an integer between %d and %d (got %o); using %d',
		key,
		min,
		max,
		value,
		fallback,
	);
	return fallback;
}

/**
 * Resolve the platform block from config.json.
 *
 * Canonical keys: name, discoveryTimeout (ms), localPort,
 * refreshInterval (seconds).
 */
export function resolvePlatformConfig(
	raw: Readonly<Record<string, unknown>>,
	log: YeelightLogger,
): YeelightPlatformSettings {
	const name =
		typeof raw.name === 'string' && raw.name.trim().length > 0
			? raw.name.trim()
			: DEFAULT_PLATFORM_SETTINGS.name;

	const discoveryTimeoutMs = readInteger(
		raw,
		'discoveryTimeout',
		DEFAULT_PLATFORM_SETTINGS.discoveryTimeoutMs,
		100,
		60_000,
		log,
	);

	const localPort = readInteger(raw, 'localPort', DEFAULT_PLATFORM_SETTINGS.localPort, 1, 65_535, log);

	const refreshIntervalSeconds = readInteger(
		raw,
		'refreshInterval',
		DEFAULT_PLATFORM_SETTINGS.refreshIntervalMs / 1000,
		0,
		86_400,
		log,
	);

	return {
		name,
		discoveryTimeoutMs,
		localPort,
		refreshIntervalMs: refreshIntervalSeconds * 1000,
	};
}
