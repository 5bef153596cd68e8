/**
 * Outbound Sender
 *
 * Frames a user line with CRLF, encodes it for the peer and writes it.
 */

import { logger } from "./logger.js";
import { identityTranscoder } from "./transcoder.js";
import type { ChatSocket, SendResult, Transcoder } from "./types.js";
import { EXIT_OK, EXIT_SEND_FAILED, LINE_TERMINATOR } from "./types.js";

/**
 * Wire bytes for one line. Falls back to UTF-8 when the transcoder throws.
 */
export function encodeLine(transcoder: Transcoder, text: string): Buffer {
	const line = text + LINE_TERMINATOR;
	try {
		return transcoder.encode(line);
	} catch (err) {
		logger.debug(`[sender] encode to ${transcoder.charset} failed: ${err}`);
		return identityTranscoder.encode(line);
	}
}

/**
 * Write the whole buffer. A short write is retried with the remainder;
 * a non-positive write fails the send.
 */
export function writeAll(socket: ChatSocket, bytes: Buffer): SendResult {
	let offset = 0;
	while (offset < bytes.length) {
		const written = socket.write(bytes.subarray(offset));
		if (written <= 0) {
			return {
				code: EXIT_SEND_FAILED,
				bytes: offset,
				message: `write returned ${written}`,
			};
		}
		offset += written;
	}
	return { code: EXIT_OK, bytes: offset };
}

export function sendLine(
	socket: ChatSocket,
	transcoder: Transcoder,
	text: string,
): SendResult {
	return writeAll(socket, encodeLine(transcoder, text));
}
