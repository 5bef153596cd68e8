/**
 * Peer Chat Types
 *
 * Shared types and constants for the direct chat engine.
 */

// Result codes
export const EXIT_OK = 0;
export const EXIT_SEND_FAILED = 1;
export const EXIT_SESSION_ENDED = 2;
export const EXIT_INVALID = 3;
export const EXIT_OFFLINE = 4;

export type ResultCode =
	| typeof EXIT_OK
	| typeof EXIT_SEND_FAILED
	| typeof EXIT_SESSION_ENDED
	| typeof EXIT_INVALID
	| typeof EXIT_OFFLINE;

// Wire format
export const LF = 0x0a;
export const CR = 0x0d;
export const CTCP_MARKER = 0x01;
export const ACTION_PREFIX = "ACTION ";
export const LINE_TERMINATOR = "\r\n";

export type SessionStatus = "active" | "aborted" | "failed";

export type CloseReason = Exclude<SessionStatus, "active">;

/**
 * What one read event produced: the bytes read, or a non-positive count
 * when the peer closed the stream (0) or the socket errored (negative).
 */
export type ReadResult = Buffer | number;

/** Raw socket handle, owned by a session and closed exactly once. */
export interface ChatSocket {
	/** Returns the number of bytes written, or a non-positive value on error. */
	write(bytes: Uint8Array): number;
	close(): void;
	/** Report a write that failed after `write` had already returned. */
	onWriteError?(listener: (err: Error) => void): void;
}

/** Byte <-> text conversion for one session. Either direction may throw. */
export interface Transcoder {
	/** Charset name, or `null` for the identity (UTF-8) transcoder. */
	readonly charset: string | null;
	encode(text: string): Buffer;
	decode(bytes: Uint8Array): string;
}

/** The two escape schemes a decoded line passes through. */
export interface ColorCodec {
	/** Remove client-native escapes, replacing unparseable ones with `placeholder`. */
	strip(text: string, placeholder: string): string;
	/** Turn the wire protocol's in-band codes into client-native escapes. */
	expand(text: string): string;
}

export type DecodeStage = "transcode" | "strip" | "expand";

export interface DecodedLine {
	text: string;
	isAction: boolean;
	/** Pipeline stages that failed and fell back to their input. */
	fallbacks: readonly DecodeStage[];
}

export interface SendResult {
	code: ResultCode;
	bytes?: number;
	message?: string;
}

/**
 * External surface that renders a tagged, formatted line.
 * `target` is the display surface id, or `null` for the core surface.
 */
export interface DisplaySink {
	print(target: string | null, tags: readonly string[], text: string): void;
}
