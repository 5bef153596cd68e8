/**
 * Line Decoder
 *
 * Turns one raw line into display-ready text: CTCP action detection,
 * charset decoding, ANSI stripping and IRC colour expansion. Every stage
 * that throws is skipped in favour of its input, so a line always decodes.
 */

import { ansiIrcColorCodec } from "./colors.js";
import { logger } from "./logger.js";
import { identityTranscoder } from "./transcoder.js";
import type {
	ColorCodec,
	DecodedLine,
	DecodeStage,
	Transcoder,
} from "./types.js";
import { ACTION_PREFIX, CTCP_MARKER } from "./types.js";

const ACTION_BYTES = Buffer.from(ACTION_PREFIX, "latin1");

export interface DecodePipeline {
	transcoder: Transcoder;
	colors: ColorCodec;
	placeholder: string;
}

export const defaultPipeline: DecodePipeline = {
	transcoder: identityTranscoder,
	colors: ansiIrcColorCodec,
	placeholder: "?",
};

/**
 * Unwrap a `\x01...\x01` line and report whether it carried `ACTION `.
 */
export function detectAction(raw: Buffer): { body: Buffer; isAction: boolean } {
	if (
		raw.length === 0 ||
		raw[0] !== CTCP_MARKER ||
		raw[raw.length - 1] !== CTCP_MARKER
	) {
		return { body: raw, isAction: false };
	}
	const body = raw.subarray(1, Math.max(1, raw.length - 1));
	if (
		body.length >= ACTION_BYTES.length &&
		body.subarray(0, ACTION_BYTES.length).equals(ACTION_BYTES)
	) {
		return { body: body.subarray(ACTION_BYTES.length), isAction: true };
	}
	return { body, isAction: false };
}

function runStage(
	stage: DecodeStage,
	fallbacks: DecodeStage[],
	fallback: () => string,
	fn: () => string,
): string {
	try {
		return fn();
	} catch (err) {
		logger.debug(`[decoder] ${stage} failed, keeping previous text: ${err}`);
		fallbacks.push(stage);
		return fallback();
	}
}

export function decodeLine(
	raw: Buffer,
	pipeline: DecodePipeline = defaultPipeline,
): DecodedLine {
	const { body, isAction } = detectAction(raw);
	const fallbacks: DecodeStage[] = [];

	const decoded = runStage(
		"transcode",
		fallbacks,
		() => identityTranscoder.decode(body),
		() => pipeline.transcoder.decode(body),
	);
	const clean = runStage(
		"strip",
		fallbacks,
		() => decoded,
		() => pipeline.colors.strip(decoded, pipeline.placeholder),
	);
	const text = runStage(
		"expand",
		fallbacks,
		() => clean,
		() => pipeline.colors.expand(clean),
	);

	return { text, isAction, fallbacks };
}
