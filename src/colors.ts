/**
 * Colour and formatting escapes
 *
 * Two schemes meet here. The client-native one is ANSI/ECMA-48 (what the
 * terminal renders); the wire one is the IRC in-band code set (bold, colour,
 * reset...). Incoming text has stray ANSI removed first, then its IRC codes
 * expanded into ANSI SGR sequences.
 */

import type { ColorCodec } from "./types.js";

const ESC = "\x1b";
export const SGR_RESET = `${ESC}[0m`;

// IRC in-band codes
const IRC_BOLD = "\x02";
const IRC_COLOR = "\x03";
const IRC_RESET = "\x0f";
const IRC_MONOSPACE = "\x11";
const IRC_REVERSE = "\x16";
const IRC_ITALIC = "\x1d";
const IRC_STRIKETHROUGH = "\x1e";
const IRC_UNDERLINE = "\x1f";

// mIRC palette 0-15 as ANSI foreground codes; background is +10
const MIRC_TO_ANSI = [
	97, 30, 34, 32, 91, 31, 35, 33, 93, 92, 36, 96, 94, 95, 90, 37,
];
const MIRC_DEFAULT = 99;

const NAMED_COLORS: Record<string, number> = {
	default: 39,
	black: 30,
	darkgray: 90,
	red: 31,
	lightred: 91,
	green: 32,
	lightgreen: 92,
	brown: 33,
	yellow: 93,
	blue: 34,
	lightblue: 94,
	magenta: 35,
	lightmagenta: 95,
	cyan: 36,
	lightcyan: 96,
	gray: 37,
	white: 97,
};

export function sgr(...codes: number[]): string {
	return `${ESC}[${codes.join(";")}m`;
}

function inRange(code: number, low: number, high: number): boolean {
	return code >= low && code <= high;
}

/**
 * Index just past the escape sequence starting at `start`, or -1 if the
 * sequence is malformed or truncated.
 */
function escapeEnd(text: string, start: number): number {
	const len = text.length;
	if (start + 1 >= len) return -1;
	const next = text.charCodeAt(start + 1);

	// CSI: ESC [ params intermediates final
	if (next === 0x5b) {
		let j = start + 2;
		while (j < len && inRange(text.charCodeAt(j), 0x30, 0x3f)) j++;
		while (j < len && inRange(text.charCodeAt(j), 0x20, 0x2f)) j++;
		return j < len && inRange(text.charCodeAt(j), 0x40, 0x7e) ? j + 1 : -1;
	}

	// OSC, DCS, SOS, PM, APC: string terminated by BEL or ESC \
	if (next === 0x5d || next === 0x50 || next === 0x58 || next === 0x5e || next === 0x5f) {
		for (let j = start + 2; j < len; j++) {
			const code = text.charCodeAt(j);
			if (code === 0x07) return j + 1;
			if (code === 0x1b && text[j + 1] === "\\") return j + 2;
		}
		return -1;
	}

	// nF: intermediates then a final byte
	if (inRange(next, 0x20, 0x2f)) {
		let j = start + 1;
		while (j < len && inRange(text.charCodeAt(j), 0x20, 0x2f)) j++;
		return j < len && inRange(text.charCodeAt(j), 0x30, 0x7e) ? j + 1 : -1;
	}

	// Two-byte Fp/Fe/Fs sequences
	if (inRange(next, 0x30, 0x7e)) return start + 2;

	return -1;
}

/**
 * Remove ANSI escape sequences. Each ESC that does not start a complete
 * sequence becomes `placeholder`; scanning resumes right after it.
 */
export function stripAnsi(text: string, placeholder = "?"): string {
	let out = "";
	let i = 0;
	while (i < text.length) {
		const ch = text[i];
		if (ch !== ESC) {
			out += ch;
			i++;
			continue;
		}
		const end = escapeEnd(text, i);
		if (end === -1) {
			out += placeholder;
			i++;
		} else {
			i = end;
		}
	}
	return out;
}

function isDigit(text: string, index: number): boolean {
	return index < text.length && inRange(text.charCodeAt(index), 0x30, 0x39);
}

/** Read up to two digits starting at `index`. */
function readColorNumber(
	text: string,
	index: number,
): { value: number; next: number } | null {
	if (!isDigit(text, index)) return null;
	let next = index + 1;
	if (isDigit(text, next)) next++;
	return { value: Number(text.slice(index, next)), next };
}

function mircColor(value: number, background: boolean): number | null {
	if (value === MIRC_DEFAULT) return background ? 49 : 39;
	const code = MIRC_TO_ANSI[value];
	if (code === undefined) return null;
	return background ? code + 10 : code;
}

/**
 * Expand IRC formatting codes into ANSI SGR sequences.
 */
export function expandIrcColors(text: string): string {
	let bold = false;
	let italic = false;
	let underline = false;
	let reverse = false;
	let strikethrough = false;
	let out = "";

	let i = 0;
	while (i < text.length) {
		const ch = text[i];
		switch (ch) {
			case IRC_BOLD:
				bold = !bold;
				out += sgr(bold ? 1 : 22);
				i++;
				break;
			case IRC_ITALIC:
				italic = !italic;
				out += sgr(italic ? 3 : 23);
				i++;
				break;
			case IRC_UNDERLINE:
				underline = !underline;
				out += sgr(underline ? 4 : 24);
				i++;
				break;
			case IRC_REVERSE:
				reverse = !reverse;
				out += sgr(reverse ? 7 : 27);
				i++;
				break;
			case IRC_STRIKETHROUGH:
				strikethrough = !strikethrough;
				out += sgr(strikethrough ? 9 : 29);
				i++;
				break;
			case IRC_RESET:
				bold = italic = underline = reverse = strikethrough = false;
				out += SGR_RESET;
				i++;
				break;
			case IRC_MONOSPACE:
				i++;
				break;
			case IRC_COLOR: {
				i++;
				const fg = readColorNumber(text, i);
				if (!fg) {
					out += sgr(39, 49);
					break;
				}
				i = fg.next;
				const codes: number[] = [];
				const fgCode = mircColor(fg.value, false);
				if (fgCode !== null) codes.push(fgCode);
				if (text[i] === ",") {
					const bg = readColorNumber(text, i + 1);
					if (bg) {
						i = bg.next;
						const bgCode = mircColor(bg.value, true);
						if (bgCode !== null) codes.push(bgCode);
					}
				}
				if (codes.length > 0) out += sgr(...codes);
				break;
			}
			default:
				out += ch;
				i++;
		}
	}
	return out;
}

function colorCode(name: string, background: boolean): number[] {
	const trimmed = name.trim().toLowerCase();
	if (trimmed in NAMED_COLORS) {
		const code = NAMED_COLORS[trimmed];
		return [background ? code + 10 : code];
	}
	if (/^\d{1,3}$/.test(trimmed)) {
		const value = Number(trimmed);
		if (value <= 255) return [background ? 48 : 38, 5, value];
	}
	return [];
}

/**
 * ANSI sequence for a colour name: "cyan", "lightred,blue" (fg,bg) or a
 * 256-colour index. Unknown names give an empty string.
 */
export function colorSequence(color: string): string {
	const [fg = "", bg] = color.split(",");
	const codes = [...colorCode(fg, false), ...(bg ? colorCode(bg, true) : [])];
	return codes.length > 0 ? sgr(...codes) : "";
}

export function paint(color: string, text: string): string {
	return `${colorSequence(color)}${text}${SGR_RESET}`;
}

/**
 * Colour name as it appears in a tag ("," is the tag separator)
 */
export function colorForTags(color: string | undefined): string {
	return color ? color.replace(/,/g, ":") : "default";
}

export const ansiIrcColorCodec: ColorCodec = {
	strip: stripAnsi,
	expand: expandIrcColors,
};
