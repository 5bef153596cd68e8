/**
 * Charset transcoders injected into chat sessions.
 */

import iconv from "iconv-lite";
import type { Transcoder } from "./types.js";

function toBuffer(bytes: Uint8Array): Buffer {
	return Buffer.isBuffer(bytes)
		? bytes
		: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Bytes are already UTF-8, the client's internal representation. */
export const identityTranscoder: Transcoder = {
	charset: null,
	encode(text: string): Buffer {
		return Buffer.from(text, "utf8");
	},
	decode(bytes: Uint8Array): string {
		return toBuffer(bytes).toString("utf8");
	},
};

export function isIdentityTranscoder(transcoder: Transcoder): boolean {
	return transcoder.charset === null;
}

/**
 * Create a transcoder for a named charset (e.g. "iso-8859-1", "cp1252").
 * Throws when iconv-lite does not know the charset.
 */
export function createCharsetTranscoder(charset: string): Transcoder {
	if (!iconv.encodingExists(charset)) {
		throw new Error(`Unknown charset: ${charset}`);
	}
	return {
		charset,
		encode(text: string): Buffer {
			return iconv.encode(text, charset);
		},
		decode(bytes: Uint8Array): string {
			return iconv.decode(toBuffer(bytes), charset);
		},
	};
}

/**
 * Resolve an optional charset name to a transcoder; no name means identity.
 */
export function resolveTranscoder(charset?: string | null): Transcoder {
	return charset ? createCharsetTranscoder(charset) : identityTranscoder;
}
