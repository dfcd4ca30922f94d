// src/yeelight/errors.ts

/**
 * Base class for everything this plugin throws on purpose.
 *
 * Discovery only lets ConfigurationError and TransportSendError reach the
 * caller; ParseError and DecodeError stay inside a session and cost one
 * datagram each.
 */
export class YeelightError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Invalid multicast group, bad port, or the socket could not be set up. */
export class ConfigurationError extends YeelightError {}

/** The search query could not be sent. */
export class TransportSendError extends YeelightError {}

/** The datagram is not an HTTP-style response we can frame. */
export class ParseError extends YeelightError {}

export class DecodeError extends YeelightError {
	constructor(
		message: string,
		public readonly fieldName: string,
	) {
		super(message);
	}
}

export class FieldMissingError extends DecodeError {
	constructor(fieldName: string) {
		super(`Advertisement is missing field "${fieldName}"`, fieldName);
	}
}

export class FieldInvalidError extends DecodeError {
	constructor(
		fieldName: string,
		public readonly rawValue: string,
	) {
		super(`Advertisement field "${fieldName}" has invalid value "${rawValue}"`, fieldName);
	}
}

/** The control stream to a device failed to open or to carry a command. */
export class ConnectionError extends YeelightError {}
