// src/yeelight/device.ts

export type PowerState = 'on' | 'off';

export const ColorMode = {
	Color: 'color',
	ColorTemperature: 'color_temperature',
	Hsv: 'hsv',
} as const;

export type ColorMode = (typeof ColorMode)[keyof typeof ColorMode];

export interface Rgb {
	red: number;
	green: number;
	blue: number;
}

export interface DeviceLocation {
	address: string;
	port: number;
}

export interface DeviceFields {
	location: DeviceLocation;
	id: string;
	model: string;
	firmwareVersion: number;
	supportedCommands: ReadonlySet<string>;
	power: PowerState;
	brightness: number;
	colorMode: ColorMode;

	// only meaningful when colorMode is ColorTemperature
	colorTemperature: number;

	// only meaningful when colorMode is Color
	rgb: Rgb;

	// only meaningful when colorMode is Hsv
	hue: number;
	saturation: number;

	name: string;
}

/**
 * One discovered light, as advertised in a single discovery response.
 *
 * Identity is the firmware-assigned `id` only. The location can move with
 * DHCP and every other field is a state snapshot, so two Device values with
 * the same id are the same device even when the rest differs.
 */
export class Device implements DeviceFields {
	public readonly location: DeviceLocation;
	public readonly id: string;
	public readonly model: string;
	public readonly firmwareVersion: number;
	public readonly supportedCommands: ReadonlySet<string>;
	public readonly power: PowerState;
	public readonly brightness: number;
	public readonly colorMode: ColorMode;
	public readonly colorTemperature: number;
	public readonly rgb: Readonly<Rgb>;
	public readonly hue: number;
	public readonly saturation: number;
	public readonly name: string;

	public constructor(fields: DeviceFields) {
		this.location = Object.freeze({ ...fields.location });
		this.id = fields.id;
		this.model = fields.model;
		this.firmwareVersion = fields.firmwareVersion;
		this.supportedCommands = new Set(fields.supportedCommands);
		this.power = fields.power;
		this.brightness = fields.brightness;
		this.colorMode = fields.colorMode;
		this.colorTemperature = fields.colorTemperature;
		this.rgb = Object.freeze({ ...fields.rgb });
		this.hue = fields.hue;
		this.saturation = fields.saturation;
		this.name = fields.name;
		Object.freeze(this);
	}

	public get identityKey(): string {
		return this.id;
	}

	public equals(other: Device): boolean {
		return this.id === other.id;
	}

	public supports(command: string): boolean {
		return this.supportedCommands.has(command);
	}

	public toString(): string {
		return `${this.model} ${this.id} @ ${this.location.address}:${this.location.port}`;
	}
}
