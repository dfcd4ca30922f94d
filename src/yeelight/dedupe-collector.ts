// src/yeelight/dedupe-collector.ts

import type { Device } from './device.js';

/**
 * Accumulates the devices seen during one discovery session.
 *
 * First response wins: a later advertisement for an id already held is
 * dropped even when its state fields differ.
 */
export class DedupeCollector {
	private readonly devices = new Map<string, Device>();

	/** Returns true when the device was new to this session. */
	public offer(device: Device): boolean {
		if (this.devices.has(device.identityKey)) {
			return false;
		}
		this.devices.set(device.identityKey, device);
		return true;
	}

	public get size(): number {
		return this.devices.size;
	}

	public finish(): Device[] {
		return [...this.devices.values()];
	}
}
