// src/yeelight/device-connection.ts

import net from 'node:net';

import type { DeviceLocation, Rgb } from './device.js';
import { ConnectionError } from './errors.js';
import { createConsoleLogger, describeError } from './logger.js';
import type { YeelightLogger } from './logger.js';

export type CommandParam = string | number;

/** The parts of net.Socket the control stream uses. */
export interface ControlSocket {
	readonly destroyed: boolean;
	setEncoding(encoding: BufferEncoding): void;
	write(data: string, callback: (err?: Error | null) => void): void;
	destroy(): void;
	on(event: 'data', listener: (chunk: string | Buffer) => void): void;
	on(event: 'close', listener: () => void): void;
	on(event: 'error', listener: (err: Error) => void): void;
	once(event: 'connect', listener: () => void): void;
	once(event: 'error', listener: (err: Error) => void): void;
	removeListener(event: 'error', listener: (err: Error) => void): void;
}

export interface DeviceConnectionOptions {
	/** Connect timeout in milliseconds. Default: 5000 */
	timeoutMs?: number;
	logger?: YeelightLogger;
	createConnection?: (location: DeviceLocation) => ControlSocket;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const TRANSITION_MS = 300;

const openTcpSocket = (location: DeviceLocation): ControlSocket =>
	net.createConnection({ host: location.address, port: location.port });

/**
 * Line-delimited JSON control stream to one bulb.
 *
 * Discovery never opens one of these; callers connect lazily when they
 * first need to command a device, and a failed connect leaves the
 * discovered Device untouched.
 */
export class DeviceConnection {
	private seq = 0;
	private readBuffer = '';
	private open = true;

	private constructor(
		private readonly socket: ControlSocket,
		public readonly location: DeviceLocation,
		private readonly log: YeelightLogger,
	) {
		this.attachSocketListeners();
	}

	public static connect(location: DeviceLocation, options: DeviceConnectionOptions = {}): Promise<DeviceConnection> {
		const log = options.logger ?? createConsoleLogger('yeelight-control');
		const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
		const endpoint = `${location.address}:${location.port}`;

		log.debug('[Yeelight Control] connecting to %s…', endpoint);

		const connectError = (err: unknown) =>
			new ConnectionError(`Failed to connect to ${endpoint}: ${describeError(err)}`, { cause: err });

		return new Promise((resolve, reject) => {
			let sock: ControlSocket;
			try {
				sock = (options.createConnection ?? openTcpSocket)(location);
			} catch (err) {
				// e.g. net rejects an out-of-range port before any I/O
				reject(connectError(err));
				return;
			}

			const fail = (err: unknown) => {
				clearTimeout(timer);
				sock.destroy();
				reject(connectError(err));
			};

			const timer = setTimeout(() => {
				sock.removeListener('error', fail);
				fail(new Error(`timed out after ${timeoutMs}ms`));
			}, timeoutMs);

			sock.once('error', fail);
			sock.once('connect', () => {
				clearTimeout(timer);
				sock.removeListener('error', fail);
				log.info('[Yeelight Control] connected to %s', endpoint);
				resolve(new DeviceConnection(sock, { ...location }, log));
			});
		});
	}

	public get isOpen(): boolean {
		return this.open && !this.socket.destroyed;
	}

	/**
	 * Write one command line and resolve once it is flushed to the socket.
	 * Returns the command id so callers can match the bulb's reply in logs.
	 */
	public send(method: string, params: CommandParam[]): Promise<number> {
		if (!this.isOpen) {
			return Promise.reject(new ConnectionError(
				`Connection to ${this.location.address}:${this.location.port} is closed`,
			));
		}

		const id = this.nextSeq();
		const line = `${JSON.stringify({ id, method, params })}\r\n`;

		return new Promise((resolve, reject) => {
			this.socket.write(line, (err) => {
				if (err) {
					reject(new ConnectionError(`Failed to send ${method}: ${err.message}`, { cause: err }));
					return;
				}
				this.log.debug('[Yeelight Control] sent id=%d %s %o', id, method, params);
				resolve(id);
			});
		});
	}

	public setPower(on: boolean): Promise<number> {
		return this.send('set_power', [on ? 'on' : 'off', 'smooth', TRANSITION_MS]);
	}

	public setBrightness(brightness: number): Promise<number> {
		return this.send('set_bright', [clamp(Math.round(brightness), 1, 100), 'smooth', TRANSITION_MS]);
	}

	public setRgb(rgb: Rgb): Promise<number> {
		const packed = (clampByte(rgb.red) << 16) | (clampByte(rgb.green) << 8) | clampByte(rgb.blue);
		return this.send('set_rgb', [packed, 'smooth', TRANSITION_MS]);
	}

	public setHsv(hue: number, saturation: number): Promise<number> {
		return this.send('set_hsv', [
			clamp(Math.round(hue), 0, 359),
			clamp(Math.round(saturation), 0, 100),
			'smooth',
			TRANSITION_MS,
		]);
	}

	public setColorTemperature(kelvin: number): Promise<number> {
		return this.send('set_ct_abx', [clamp(Math.round(kelvin), 1700, 6500), 'smooth', TRANSITION_MS]);
	}

	public close(): void {
		if (!this.open) {
			return;
		}
		this.open = false;
		this.socket.destroy();
		this.log.debug('[Yeelight Control] closed connection to %s:%d', this.location.address, this.location.port);
	}

	private nextSeq(): number {
		if (this.seq === 65535) {
			this.seq = 1;
		} else {
			this.seq++;
		}
		return this.seq;
	}

	private attachSocketListeners(): void {
		this.socket.setEncoding('utf8');

		this.socket.on('data', (chunk) => {
			this.readBuffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
			this.processIncoming();
		});

		this.socket.on('close', () => {
			this.open = false;
			this.log.debug('[Yeelight Control] socket to %s closed.', this.location.address);
		});

		this.socket.on('error', (err) => {
			this.log.warn('[Yeelight Control] socket error from %s: %s', this.location.address, String(err));
		});
	}

	private processIncoming(): void {
		let newline = this.readBuffer.indexOf('\n');
		while (newline !== -1) {
			const line = this.readBuffer.slice(0, newline).trim();
			this.readBuffer = this.readBuffer.slice(newline + 1);

			if (line.length > 0) {
				try {
					this.log.debug('[Yeelight Control] reply from %s: %o', this.location.address, JSON.parse(line));
				} catch {
					this.log.debug('[Yeelight Control] unparseable line from %s: %s', this.location.address, line);
				}
			}

			newline = this.readBuffer.indexOf('\n');
		}
	}
}

function clamp(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

function clampByte(n: number): number {
	return clamp(Math.round(n), 0, 255);
}
