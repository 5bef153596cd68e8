/**
 * Frame Reassembler
 *
 * Splits a fragmented inbound byte stream into LF-terminated lines,
 * carrying the unterminated tail from one read to the next.
 */

import { logger } from "./logger.js";
import { CR, LF } from "./types.js";

export interface ReassemblyResult {
	/** Complete lines, without LF and without a single trailing CR. */
	lines: Buffer[];
	/** Unterminated tail; never contains LF. */
	pending: Buffer | undefined;
	/** Bytes discarded during this pass. */
	dropped: number;
	/** Lines given up during this pass, counted once each. */
	droppedLines: number;
	/** Still skipping the rest of a dropped line; pass it to the next call. */
	discarding: boolean;
}

/**
 * Join the pending fragment with a freshly read chunk and cut it into lines.
 *
 * A line longer than `maxFragmentBytes` is dropped whole, however the stream
 * was split: once a carried fragment outgrows the limit, bytes are skipped up
 * to the next LF.
 *
 * The returned `pending` is a new buffer, never a view into `chunk`.
 */
export function reassemble(
	pending: Buffer | undefined,
	chunk: Buffer,
	maxFragmentBytes = Number.POSITIVE_INFINITY,
	discarding = false,
): ReassemblyResult {
	let dropped = 0;
	let droppedLines = 0;
	let skipping = discarding;
	let data = chunk;

	if (pending && pending.length > 0) {
		try {
			data = Buffer.concat([pending, chunk]);
		} catch (err) {
			// Carried fragment is lost; its tail in this chunk goes with it
			logger.warn(
				`[reassembler] Dropping ${pending.length} carried bytes: ${err}`,
			);
			dropped += pending.length;
			droppedLines++;
			skipping = true;
		}
	}

	const lines: Buffer[] = [];
	let start = 0;
	let pos = data.indexOf(LF, start);
	while (pos !== -1) {
		const length = pos - start;
		if (skipping) {
			dropped += length;
			skipping = false;
		} else if (length > maxFragmentBytes) {
			logger.warn(
				`[reassembler] Line exceeds ${maxFragmentBytes} bytes, dropping ${length} bytes`,
			);
			dropped += length;
			droppedLines++;
		} else {
			const end = pos > start && data[pos - 1] === CR ? pos - 1 : pos;
			lines.push(data.subarray(start, end));
		}
		start = pos + 1;
		pos = data.indexOf(LF, start);
	}

	let rest: Buffer | undefined;
	const tail = data.length - start;
	if (tail > 0) {
		if (skipping) {
			dropped += tail;
		} else if (tail > maxFragmentBytes) {
			logger.warn(
				`[reassembler] Unterminated line exceeds ${maxFragmentBytes} bytes, dropping ${tail} bytes`,
			);
			dropped += tail;
			droppedLines++;
			skipping = true;
		} else {
			rest = Buffer.from(data.subarray(start));
		}
	}

	return { lines, pending: rest, dropped, droppedLines, discarding: skipping };
}
