/**
 * Display Router
 *
 * Builds classification tags and the formatted string for each line and
 * hands them to the display sink.
 */

import { ansiIrcColorCodec, colorForTags, paint } from "./colors.js";
import { getChatConfig, getPvTags } from "./config.js";
import { logger } from "./logger.js";
import type { ColorCodec, DecodedLine, DisplaySink } from "./types.js";

export const PREFIX_ACTION = " *\t";
export const PREFIX_NETWORK = "--\t";
export const PREFIX_ERROR = "=!=\t";

const PRODUCT = "peerchat";

/** Identity and surface details the router needs from a session. */
export interface DisplayTarget {
	readonly surface: string | null;
	readonly remoteNick: string;
	readonly localNick: string;
	readonly remoteNickColor?: string;
	readonly remoteAddress?: string;
}

export function formatTags(tags: readonly string[]): string {
	return tags.join(",");
}

function remoteColor(target: DisplayTarget): string {
	return target.remoteNickColor ?? getChatConfig().nickColors.other;
}

export function inboundTags(target: DisplayTarget, line: DecodedLine): string[] {
	const pvTags = getPvTags();
	if (line.isAction) {
		return [
			"irc_privmsg",
			"irc_action",
			...pvTags,
			`nick_${target.remoteNick}`,
			"log1",
		];
	}
	return [
		"irc_privmsg",
		...pvTags,
		`prefix_nick_${colorForTags(remoteColor(target))}`,
		`nick_${target.remoteNick}`,
		"log1",
	];
}

export function echoTags(target: DisplayTarget): string[] {
	return [
		"irc_privmsg",
		"no_highlight",
		`prefix_nick_${colorForTags(getChatConfig().nickColors.self)}`,
		`nick_${target.localNick}`,
		"log1",
	];
}

export function formatInbound(target: DisplayTarget, line: DecodedLine): string {
	const nick = paint(remoteColor(target), target.remoteNick);
	if (line.isAction) {
		return `${PREFIX_ACTION}${nick}${line.text ? " " : ""}${line.text}`;
	}
	return `${nick}\t${line.text}`;
}

export class DisplayRouter {
	constructor(
		private readonly sink: DisplaySink,
		private readonly colors: ColorCodec = ansiIrcColorCodec,
	) {}

	inbound(target: DisplayTarget, line: DecodedLine): void {
		this.sink.print(
			target.surface,
			inboundTags(target, line),
			formatInbound(target, line),
		);
	}

	/**
	 * Show the user's own line, with its IRC codes rendered.
	 */
	echo(target: DisplayTarget, text: string): void {
		let rendered = text;
		try {
			rendered = this.colors.expand(text);
		} catch (err) {
			logger.debug(`[display] colour expansion of echo failed: ${err}`);
		}
		const nick = paint(getChatConfig().nickColors.self, target.localNick);
		this.sink.print(target.surface, echoTags(target), `${nick}\t${rendered}`);
	}

	connected(target: DisplayTarget): void {
		const address = target.remoteAddress ? ` (${target.remoteAddress})` : "";
		this.sink.print(
			target.surface,
			[],
			`${PREFIX_NETWORK}${PRODUCT}: connected to ${target.remoteNick}${address} via direct chat`,
		);
	}

	closed(target: DisplayTarget): void {
		this.sink.print(
			target.surface,
			[],
			`${PREFIX_NETWORK}${PRODUCT}: chat closed with ${target.remoteNick}`,
		);
	}

	sendError(target: DisplayTarget): void {
		this.sink.print(
			null,
			[],
			`${PREFIX_ERROR}${PRODUCT}: error sending data to "${target.remoteNick}" via direct chat`,
		);
	}
}
