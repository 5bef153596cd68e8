/**
 * Swarm Connector
 *
 * Finds a chat partner on a named Hyperswarm topic and opens a direct chat
 * over the resulting connection.
 */

import { createHash } from "crypto";
import Hyperswarm from "hyperswarm";
import type { Duplex } from "stream";
import { getSwarmOptions } from "./config.js";
import { logger } from "./logger.js";
import type { ChatTask, OpenChatOptions } from "./reactor.js";
import { openChat } from "./reactor.js";

/** The parts of Hyperswarm the connector uses. */
export interface SwarmLike {
	on(
		event: "connection",
		listener: (socket: Duplex, peerInfo: Hyperswarm.PeerInfo) => void,
	): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
	join(topic: Buffer, opts?: Hyperswarm.JoinOptions): unknown;
	destroy(): Promise<void>;
}

export interface ChatSwarmOptions
	extends Omit<OpenChatOptions, "remoteNick" | "surface" | "remoteAddress"> {
	topic: string;
	/** Peers kept at once; a direct chat wants one */
	maxPeers?: number;
	onChat?: (task: ChatTask) => void;
	createSwarm?: (opts: Hyperswarm.SwarmOptions) => SwarmLike;
}

export interface ChatSwarm {
	readonly topic: string;
	chats(): ChatTask[];
	destroy(): Promise<void>;
}

/**
 * Hash a topic name to a 32-byte key for the DHT
 */
export function hashTopic(topic: string): Buffer {
	return createHash("sha256").update(`peerchat:topic:${topic}`).digest();
}

/**
 * Short, stable display id for a public key
 */
export function shortKey(publicKey: string): string {
	return createHash("sha256").update(publicKey).digest("hex").slice(0, 8);
}

export function createChatSwarm(options: ChatSwarmOptions): ChatSwarm {
	const { topic, maxPeers = 1, onChat, createSwarm, ...chatOptions } = options;
	const swarmOptions: Hyperswarm.SwarmOptions = { ...getSwarmOptions(), maxPeers };
	const swarm: SwarmLike = createSwarm
		? createSwarm(swarmOptions)
		: new Hyperswarm(swarmOptions);
	const tasks: ChatTask[] = [];

	swarm.on("error", (err: Error) => {
		logger.warn(`[swarm] Swarm error: ${err.message}`);
	});

	swarm.on("connection", (socket: Duplex, peerInfo: Hyperswarm.PeerInfo) => {
		const remoteKey = peerInfo.publicKey?.toString("hex");
		const remoteNick = remoteKey ? shortKey(remoteKey) : "unknown";
		logger.info(`[swarm] Connection from ${remoteNick} on ${topic}`);

		let task: ChatTask;
		try {
			task = openChat(socket, {
				...chatOptions,
				remoteNick,
				surface: `dcc.${remoteNick}`,
				remoteAddress: `swarm:${topic}`,
			});
		} catch (err) {
			logger.warn(`[swarm] Could not open chat with ${remoteNick}: ${err}`);
			socket.destroy();
			return;
		}

		tasks.push(task);
		task.session.onClose(() => {
			const index = tasks.indexOf(task);
			if (index !== -1) tasks.splice(index, 1);
		});
		onChat?.(task);
	});

	swarm.join(hashTopic(topic), { server: true, client: true });
	logger.info(`[swarm] Joined topic: ${topic}`);

	return {
		topic,
		chats: () => [...tasks],
		destroy: async () => {
			for (const task of [...tasks]) {
				task.cancel();
			}
			await swarm.destroy();
		},
	};
}
