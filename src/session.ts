/**
 * Chat Session
 *
 * Per-connection state and lifecycle for a direct chat with one peer.
 * A session starts active and ends exactly once, either aborted (the peer
 * went away) or failed (we could not write). Nothing happens after that.
 */

import { ansiIrcColorCodec } from "./colors.js";
import { getChatConfig } from "./config.js";
import { decodeLine } from "./decoder.js";
import type { DisplayTarget } from "./display.js";
import { DisplayRouter } from "./display.js";
import { logger } from "./logger.js";
import { reassemble } from "./reassembler.js";
import { sendLine } from "./sender.js";
import { incrementStat } from "./stats.js";
import { identityTranscoder } from "./transcoder.js";
import type {
	ChatSocket,
	CloseReason,
	ColorCodec,
	DecodedLine,
	DisplaySink,
	ReadResult,
	SendResult,
	SessionStatus,
	Transcoder,
} from "./types.js";
import { EXIT_OK, EXIT_SESSION_ENDED } from "./types.js";

export type CloseListener = (session: ChatSession, reason: CloseReason) => void;

export interface ChatSessionOptions {
	socket: ChatSocket;
	remoteNick: string;
	localNick: string;
	sink: DisplaySink;
	/** Display surface id; `null` prints to the core surface */
	surface?: string | null;
	remoteNickColor?: string;
	remoteAddress?: string;
	/** Defaults to the identity transcoder */
	transcoder?: Transcoder;
	colors?: ColorCodec;
	onClose?: CloseListener;
}

export class ChatSession implements DisplayTarget {
	readonly remoteNick: string;
	readonly localNick: string;
	readonly surface: string | null;
	readonly remoteNickColor?: string;
	readonly remoteAddress?: string;
	readonly transcoder: Transcoder;

	private readonly colors: ColorCodec;
	private readonly display: DisplayRouter;
	private readonly closeListeners: CloseListener[] = [];
	private socket: ChatSocket | null;
	private currentStatus: SessionStatus = "active";
	private fragment: Buffer | undefined;
	private discarding = false;

	constructor(options: ChatSessionOptions) {
		this.socket = options.socket;
		this.remoteNick = options.remoteNick;
		this.localNick = options.localNick;
		this.surface = options.surface ?? null;
		this.remoteNickColor = options.remoteNickColor;
		this.remoteAddress = options.remoteAddress;
		this.transcoder = options.transcoder ?? identityTranscoder;
		this.colors = options.colors ?? ansiIrcColorCodec;
		this.display = new DisplayRouter(options.sink, this.colors);
		if (options.onClose) {
			this.closeListeners.push(options.onClose);
		}
		options.socket.onWriteError?.((err) => this.writeFailed(err));
		incrementStat("sessionsOpened");
	}

	get status(): SessionStatus {
		return this.currentStatus;
	}

	/** Unterminated bytes carried over from the last read. */
	get pending(): Buffer | undefined {
		return this.fragment;
	}

	hasEnded(): boolean {
		return this.currentStatus !== "active";
	}

	onClose(listener: CloseListener): void {
		this.closeListeners.push(listener);
	}

	/**
	 * Print the "connected" notice on the session's surface.
	 */
	announce(): void {
		if (this.hasEnded()) return;
		this.display.connected(this);
	}

	/**
	 * Handle one read event. Returns the lines decoded and displayed.
	 */
	receive(result: ReadResult): DecodedLine[] {
		if (this.hasEnded()) return [];

		if (typeof result === "number" || result.length === 0) {
			this.close("aborted");
			return [];
		}

		incrementStat("bytesReceived", result.length);
		const config = getChatConfig();
		const { lines, pending, droppedLines, discarding } = reassemble(
			this.fragment,
			result,
			config.maxFragmentBytes,
			this.discarding,
		);
		this.fragment = pending;
		this.discarding = discarding;
		if (droppedLines > 0) {
			incrementStat("fragmentsDropped", droppedLines);
		}

		const pipeline = {
			transcoder: this.transcoder,
			colors: this.colors,
			placeholder: config.placeholder,
		};
		const decoded: DecodedLine[] = [];
		for (const raw of lines) {
			// The sink may end the session while we dispatch
			if (this.hasEnded()) break;
			const line = decodeLine(raw, pipeline);
			if (line.fallbacks.length > 0) {
				incrementStat("decodeFallbacks", line.fallbacks.length);
			}
			incrementStat("linesReceived");
			this.display.inbound(this, line);
			decoded.push(line);
		}
		return decoded;
	}

	/**
	 * Write one line to the peer. A failed write ends the session.
	 */
	send(text: string): SendResult {
		if (this.hasEnded() || !this.socket) {
			return {
				code: EXIT_SESSION_ENDED,
				message: `Chat with ${this.remoteNick} has ended`,
			};
		}

		const result = sendLine(this.socket, this.transcoder, text);
		if (result.code !== EXIT_OK) {
			logger.warn(
				`[session] Send to ${this.remoteNick} failed: ${result.message}`,
			);
			this.close("failed");
			return result;
		}

		incrementStat("linesSent");
		incrementStat("bytesSent", result.bytes ?? 0);
		return result;
	}

	/**
	 * Send a line typed by the user and echo it locally.
	 */
	input(text: string): SendResult {
		const result = this.send(text);
		if (result.code === EXIT_OK && !this.hasEnded()) {
			this.display.echo(this, text);
		}
		return result;
	}

	/**
	 * A queued write failed after `send` reported success.
	 */
	private writeFailed(err: Error): void {
		if (this.hasEnded()) return;
		logger.warn(`[session] Write to ${this.remoteNick} failed: ${err.message}`);
		this.close("failed");
	}

	/**
	 * Move to a terminal state. Returns false if the session had already ended.
	 */
	close(reason: CloseReason): boolean {
		if (this.hasEnded()) return false;

		this.currentStatus = reason;
		this.fragment = undefined;
		this.discarding = false;

		const socket = this.socket;
		this.socket = null;
		try {
			socket?.close();
		} catch (err) {
			logger.warn(`[session] Closing socket to ${this.remoteNick}: ${err}`);
		}

		incrementStat(reason === "aborted" ? "sessionsAborted" : "sessionsFailed");
		logger.info(`[session] Chat with ${this.remoteNick} ${reason}`);

		if (reason === "failed") {
			this.display.sendError(this);
		} else {
			this.display.closed(this);
		}

		for (const listener of this.closeListeners) {
			listener(this, reason);
		}
		return true;
	}
}
