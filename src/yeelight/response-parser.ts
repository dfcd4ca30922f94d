// src/yeelight/response-parser.ts
// Frames one discovery datagram: an HTTP/1.1 status line followed by
// `Name: value` header lines. Bulbs answer M-SEARCH with every state field
// as a header and no body.

import { HTTPParser } from 'http-parser-js';

import { ParseError } from './errors.js';

/** Datagrams longer than this are truncated before parsing. */
export const RECEIVE_BUFFER_SIZE = 1024;

/** A full bulb advertisement carries exactly this many headers. */
export const MAX_HEADER_COUNT = 17;

export interface ParsedResponse {
	statusCode: number;
	reason: string;
	headers: Map<string, string>;
}

const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

// NUL padding from fixed-size buffers plus ordinary whitespace
const EDGE_PADDING = /^[\s\0]+|[\s\0]+$/g;

// Advertisements end after the last header line; close the head so the
// parser reports it complete.
const HEAD_TERMINATOR = '\r\n\r\n';

// The parser hands back latin1 strings; this undoes that for UTF-8 text.
const fromLatin1 = (value: string): string => Buffer.from(value, 'latin1').toString('utf8');

export function parseResponse(datagram: Uint8Array): ParsedResponse {
	const bounded = datagram.subarray(0, RECEIVE_BUFFER_SIZE);

	// Buffer#toString replaces invalid sequences with U+FFFD instead of throwing
	const text = Buffer.from(bounded.buffer, bounded.byteOffset, bounded.byteLength)
		.toString('utf8')
		.replace(EDGE_PADDING, '');

	const parser = new HTTPParser(HTTPParser.RESPONSE);
	const heads: ParsedResponse[] = [];
	let headerCount = 0;

	// The stock splitter quietly drops lines it cannot read; a bulb never
	// sends those, so treat them as a broken datagram.
	const splitHeader = parser.parseHeader.bind(parser);
	parser.parseHeader = (line, fields) => {
		const before = fields.length;
		splitHeader(line, fields);

		if (fields.length === before) {
			throw new ParseError(`Malformed header line: ${JSON.stringify(line.slice(0, 64))}`);
		}

		const name = fields[before];
		if (!HEADER_NAME.test(name)) {
			throw new ParseError(`Invalid header name: ${JSON.stringify(name)}`);
		}

		headerCount += 1;
		if (headerCount > MAX_HEADER_COUNT) {
			throw new ParseError(`Too many headers (limit ${MAX_HEADER_COUNT})`);
		}
	};

	parser[HTTPParser.kOnHeadersComplete] = (info) => {
		if (info.versionMajor !== 1) {
			throw new ParseError(`Unsupported HTTP version ${info.versionMajor}.${info.versionMinor}`);
		}

		// Flat [name, value, name, value, ...]; later duplicates overwrite
		const headers = new Map<string, string>();
		for (let i = 0; i + 1 < info.headers.length; i += 2) {
			headers.set(info.headers[i], fromLatin1(info.headers[i + 1]));
		}

		heads.push({
			statusCode: info.statusCode,
			reason: fromLatin1(info.statusMessage),
			headers,
		});
	};

	// Anything after the head is not part of an advertisement
	parser[HTTPParser.kOnBody] = () => undefined;

	// Read raw bytes one-to-one so multi-byte UTF-8 survives the round trip
	const encoding = HTTPParser.encoding;
	HTTPParser.encoding = 'latin1';
	let outcome: number | Error;
	try {
		outcome = parser.execute(Buffer.from(text + HEAD_TERMINATOR, 'utf8'));
	} finally {
		HTTPParser.encoding = encoding;
	}

	if (outcome instanceof ParseError) {
		throw outcome;
	}
	if (outcome instanceof Error) {
		throw new ParseError(`Malformed response: ${outcome.message}`, { cause: outcome });
	}

	const head = heads.at(0);
	if (!head) {
		throw new ParseError(`Invalid status line: ${JSON.stringify(text.split(/\r?\n/, 1)[0].slice(0, 64))}`);
	}

	return head;
}
