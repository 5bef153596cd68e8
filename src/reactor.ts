/**
 * Socket Reactor
 *
 * Binds a Node Duplex stream (a TCP socket, a Hyperswarm connection...) to
 * a chat session. Each `data` event becomes one or more read events of at
 * most `chunkSize` bytes; `end`, `close` and `error` become terminal reads.
 */

import type { Duplex } from "stream";
import { getChatConfig } from "./config.js";
import { logger } from "./logger.js";
import type { SessionRegistry } from "./registry.js";
import type { ChatSessionOptions } from "./session.js";
import { ChatSession } from "./session.js";
import { resolveTranscoder } from "./transcoder.js";
import type { ChatSocket } from "./types.js";

export interface OpenChatOptions extends Omit<ChatSessionOptions, "socket"> {
	/** Charset spoken by the peer; ignored when `transcoder` is given */
	charset?: string;
	/** Registers the session under its surface id */
	registry?: SessionRegistry;
}

export interface ChatTask {
	session: ChatSession;
	/** Stop reading and end the session as aborted. */
	cancel(): void;
}

/**
 * Write primitive over a Duplex. The stream queues the whole buffer, so a
 * write reports either its full length or -1. Errors the stream reports
 * later for a queued write go to `onWriteError` listeners, before the
 * stream emits `error`.
 */
export function duplexSocket(stream: Duplex): ChatSocket {
	const writeErrorListeners: ((err: Error) => void)[] = [];
	return {
		write(bytes: Uint8Array): number {
			if (stream.destroyed || !stream.writable) return -1;
			stream.write(bytes, (err) => {
				if (!err) return;
				for (const listener of writeErrorListeners) {
					listener(err);
				}
			});
			return bytes.length;
		},
		close(): void {
			stream.destroy();
		},
		onWriteError(listener: (err: Error) => void): void {
			writeErrorListeners.push(listener);
		},
	};
}

/**
 * Feed stream events into the session. Returns a function that detaches.
 */
export function attachSession(
	session: ChatSession,
	stream: Duplex,
	chunkSize = getChatConfig().chunkSize,
): () => void {
	const onData = (data: Buffer | string) => {
		const bytes = typeof data === "string" ? Buffer.from(data) : data;
		for (
			let offset = 0;
			offset < bytes.length && !session.hasEnded();
			offset += chunkSize
		) {
			session.receive(bytes.subarray(offset, offset + chunkSize));
		}
	};
	const onEnd = () => {
		session.receive(0);
	};
	const onError = (err: Error) => {
		logger.warn(`[reactor] Socket error from ${session.remoteNick}: ${err.message}`);
		session.receive(-1);
	};
	const onLateError = (err: Error) => {
		logger.debug(`[reactor] Error after detach from ${session.remoteNick}: ${err.message}`);
	};

	stream.on("data", onData);
	stream.on("end", onEnd);
	stream.on("close", onEnd);
	stream.on("error", onError);

	let attached = true;
	return () => {
		if (!attached) return;
		attached = false;
		stream.off("data", onData);
		stream.off("end", onEnd);
		stream.off("close", onEnd);
		stream.off("error", onError);
		stream.on("error", onLateError);
	};
}

/**
 * Start a chat over an established stream.
 */
export function openChat(stream: Duplex, options: OpenChatOptions): ChatTask {
	const { charset, registry, ...sessionOptions } = options;
	const transcoder =
		options.transcoder ?? resolveTranscoder(charset ?? getChatConfig().charset);

	const session = new ChatSession({
		...sessionOptions,
		transcoder,
		socket: duplexSocket(stream),
	});

	const detach = attachSession(session, stream);
	session.onClose(() => detach());

	if (registry && session.surface !== null) {
		try {
			registry.register(session.surface, session);
		} catch (err) {
			logger.warn(`[reactor] Refusing chat with ${session.remoteNick}: ${err}`);
			session.close("aborted");
			throw err;
		}
	}

	logger.info(
		`[reactor] Chat opened with ${session.remoteNick}${transcoder.charset ? ` (${transcoder.charset})` : ""}`,
	);
	session.announce();

	return {
		session,
		cancel: () => {
			detach();
			session.close("aborted");
		},
	};
}
