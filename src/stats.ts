/**
 * In-memory chat statistics collector.
 *
 * Tracks lines, bytes and session outcomes across all sessions.
 */

export interface ChatStats {
	linesReceived: number;
	linesSent: number;
	bytesReceived: number;
	bytesSent: number;
	sessionsOpened: number;
	sessionsAborted: number;
	sessionsFailed: number;
	fragmentsDropped: number;
	decodeFallbacks: number;
	startedAt: number;
}

function emptyStats(): ChatStats {
	return {
		linesReceived: 0,
		linesSent: 0,
		bytesReceived: 0,
		bytesSent: 0,
		sessionsOpened: 0,
		sessionsAborted: 0,
		sessionsFailed: 0,
		fragmentsDropped: 0,
		decodeFallbacks: 0,
		startedAt: Date.now(),
	};
}

let stats: ChatStats = emptyStats();

export function getChatStats(): Readonly<ChatStats> {
	return { ...stats };
}

export function incrementStat(
	key: keyof Omit<ChatStats, "startedAt">,
	amount = 1,
): void {
	stats[key] += amount;
}

export function resetStats(): void {
	stats = emptyStats();
}
