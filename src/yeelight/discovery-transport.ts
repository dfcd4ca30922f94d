// src/yeelight/discovery-transport.ts

import dgram from 'node:dgram';
import type { RemoteInfo } from 'node:dgram';
import net from 'node:net';
import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';

import { DedupeCollector } from './dedupe-collector.js';
import type { Device, DeviceLocation } from './device.js';
import { decodeDevice } from './device-decoder.js';
import type { HeaderSource } from './device-decoder.js';
import {
	ConfigurationError,
	DecodeError,
	ParseError,
	TransportSendError,
} from './errors.js';
import { createConsoleLogger, describeError } from './logger.js';
import type { YeelightLogger } from './logger.js';
import { parseResponse } from './response-parser.js';

export const MULTICAST_ADDRESS = '239.255.255.250';
export const MULTICAST_PORT = 1982;
export const WILDCARD_ADDRESS = '0.0.0.0';
export const DEFAULT_LOCAL_PORT = 7821;

export const SEARCH_MESSAGE = Buffer.from(
	'M-SEARCH * HTTP/1.1\r\n' +
	'HOST: 239.255.255.250:1982\r\n' +
	'MAN: "ssdp:discover"\r\n' +
	'ST: wifi_bulb',
	'ascii',
);

const LOCATION_HEADER = /^yeelight:\/\/([0-9.]+):(\d{1,5})\/?$/;

/**
 * The slice of a Node dgram socket the transport relies on.
 * Tests hand in an in-process fake through `createSocket`.
 */
export interface MulticastSocket {
	bind(port: number, address: string, callback: () => void): void;
	addMembership(multicastAddress: string): void;
	send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null) => void): void;
	on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): void;
	on(event: 'error', listener: (err: Error) => void): void;
	once(event: 'error', listener: (err: Error) => void): void;
	removeListener(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): void;
	removeListener(event: 'error', listener: (err: Error) => void): void;
	close(callback?: () => void): void;
}

export interface DiscoveryTransportOptions {
	/** Default: 239.255.255.250 */
	multicastAddress?: string;
	/** Default: 1982 */
	multicastPort?: number;
	/** Local UDP port bound on the wildcard address. Default: 7821 */
	localPort?: number;
	logger?: YeelightLogger;
	createSocket?: () => MulticastSocket;
}

const createUdpSocket = (): MulticastSocket => dgram.createSocket({ type: 'udp4', reuseAddr: true });

export function isIpv4Multicast(address: string): boolean {
	if (!net.isIPv4(address)) {
		return false;
	}
	const firstOctet = Number(address.split('.')[0]);
	return firstOctet >= 224 && firstOctet <= 239;
}

function isPort(value: number, min: number): boolean {
	return Number.isInteger(value) && value >= min && value <= 65535;
}

/**
 * Prefer the control endpoint the bulb advertises in its Location header
 * (`yeelight://<ip>:<port>`); fall back to the datagram's source.
 */
export function resolveLocation(headers: HeaderSource, rinfo: Pick<RemoteInfo, 'address' | 'port'>): DeviceLocation {
	const advertised = headers.get('Location');
	const match = advertised !== undefined ? LOCATION_HEADER.exec(advertised) : null;

	if (match && net.isIPv4(match[1])) {
		const port = Number(match[2]);
		if (isPort(port, 1)) {
			return { address: match[1], port };
		}
	}

	return { address: rinfo.address, port: rinfo.port };
}

/**
 * Owns one multicast-joined UDP socket and runs discovery sessions on it.
 *
 * A session sends a single M-SEARCH and listens until its deadline; every
 * datagram is parsed, decoded and deduplicated on its own, so a malformed
 * advertisement only loses itself.
 */
export class DiscoveryTransport {
	private closed = false;
	private sessionActive = false;

	private constructor(
		private readonly socket: MulticastSocket,
		public readonly group: DeviceLocation,
		public readonly localPort: number,
		private readonly log: YeelightLogger,
	) {
		// Errors after setup are reported but never end a session.
		this.socket.on('error', (err) => {
			this.log.warn('[Yeelight Discovery] socket error: %s', describeError(err));
		});
	}

	public static async create(options: DiscoveryTransportOptions = {}): Promise<DiscoveryTransport> {
		const multicastAddress = options.multicastAddress ?? MULTICAST_ADDRESS;
		const multicastPort = options.multicastPort ?? MULTICAST_PORT;
		const localPort = options.localPort ?? DEFAULT_LOCAL_PORT;
		const log = options.logger ?? createConsoleLogger('yeelight-discovery');

		if (!isIpv4Multicast(multicastAddress)) {
			throw new ConfigurationError(`${multicastAddress} is not an IPv4 multicast address`);
		}
		if (!isPort(multicastPort, 1)) {
			throw new ConfigurationError(`Invalid multicast port: ${multicastPort}`);
		}
		if (!isPort(localPort, 0)) {
			throw new ConfigurationError(`Invalid local port: ${localPort}`);
		}

		const socket = (options.createSocket ?? createUdpSocket)();

		try {
			await DiscoveryTransport.bindSocket(socket, localPort);
		} catch (err) {
			DiscoveryTransport.release(socket, log);
			throw new ConfigurationError(
				`Failed to bind ${WILDCARD_ADDRESS}:${localPort}: ${describeError(err)}`,
				{ cause: err },
			);
		}

		try {
			socket.addMembership(multicastAddress);
		} catch (err) {
			DiscoveryTransport.release(socket, log);
			throw new ConfigurationError(
				`Failed to join multicast group ${multicastAddress}: ${describeError(err)}`,
				{ cause: err },
			);
		}

		log.debug(
			'[Yeelight Discovery] listening on %s:%d, group %s:%d',
			WILDCARD_ADDRESS,
			localPort,
			multicastAddress,
			multicastPort,
		);

		return new DiscoveryTransport(
			socket,
			{ address: multicastAddress, port: multicastPort },
			localPort,
			log,
		);
	}

	private static bindSocket(socket: MulticastSocket, port: number): Promise<void> {
		return new Promise((resolve, reject) => {
			// dgram reports bind failures as an 'error' event, not through the callback
			socket.once('error', reject);
			socket.bind(port, WILDCARD_ADDRESS, () => {
				socket.removeListener('error', reject);
				resolve();
			});
		});
	}

	private static release(socket: MulticastSocket, log: YeelightLogger): void {
		try {
			socket.close();
		} catch (err) {
			log.debug('[Yeelight Discovery] close after failed setup: %s', describeError(err));
		}
	}

	/**
	 * Run one discovery session.
	 *
	 * Sends exactly one query, then collects advertisements until `timeoutMs`
	 * has elapsed since the call started. Resolves with one Device per id.
	 */
	public async discover(timeoutMs: number): Promise<Device[]> {
		if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
			throw new RangeError(`Invalid discovery timeout: ${timeoutMs}`);
		}
		if (this.closed) {
			throw new TransportSendError('Discovery transport is closed');
		}
		if (this.sessionActive) {
			throw new TransportSendError('A discovery session is already running on this transport');
		}

		this.sessionActive = true;
		const collector = new DedupeCollector();
		const deadline = performance.now() + timeoutMs;

		const onMessage = (msg: Buffer, rinfo: RemoteInfo): void => {
			if (performance.now() >= deadline) {
				return;
			}
			this.handleDatagram(msg, rinfo, collector);
		};

		this.socket.on('message', onMessage);
		try {
			await this.sendQuery();
			await delay(Math.max(0, deadline - performance.now()));
		} finally {
			this.socket.removeListener('message', onMessage);
			this.sessionActive = false;
		}

		const devices = collector.finish();
		this.log.info('[Yeelight Discovery] session finished; %d device(s) found', devices.length);
		return devices;
	}

	public async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await new Promise<void>((resolve) => {
			this.socket.close(() => resolve());
		});
		this.log.debug('[Yeelight Discovery] socket closed.');
	}

	private sendQuery(): Promise<void> {
		const { address, port } = this.group;

		return new Promise((resolve, reject) => {
			const fail = (err: unknown) => reject(new TransportSendError(
				`Failed to send discovery query to ${address}:${port}: ${describeError(err)}`,
				{ cause: err },
			));

			try {
				this.socket.send(SEARCH_MESSAGE, port, address, (error) => {
					if (error) {
						fail(error);
					} else {
						this.log.debug('[Yeelight Discovery] query sent to %s:%d', address, port);
						resolve();
					}
				});
			} catch (err) {
				fail(err);
			}
		});
	}

	private handleDatagram(msg: Buffer, rinfo: RemoteInfo, collector: DedupeCollector): void {
		if (rinfo.family !== 'IPv4') {
			this.log.debug('[Yeelight Discovery] ignoring non-IPv4 datagram from %s', rinfo.address);
			return;
		}

		try {
			const response = parseResponse(msg);
			const device = decodeDevice(response.headers, resolveLocation(response.headers, rinfo));

			if (collector.offer(device)) {
				this.log.debug('[Yeelight Discovery] found %s', device.toString());
			} else {
				this.log.debug('[Yeelight Discovery] duplicate advertisement for id=%s', device.id);
			}
		} catch (err) {
			if (err instanceof ParseError || err instanceof DecodeError) {
				this.log.debug(
					'[Yeelight Discovery] dropping datagram from %s:%d: %s',
					rinfo.address,
					rinfo.port,
					err.message,
				);
				return;
			}
			this.log.error(
				'[Yeelight Discovery] unexpected failure handling datagram from %s: %s',
				rinfo.address,
				describeError(err),
			);
		}
	}
}
