/**
 * Session Registry
 *
 * Maps display-surface ids to their chat sessions. A mapping lives as long
 * as its surface: an ended session stays reachable until the surface closes
 * or a new chat reuses it.
 */

import { logger } from "./logger.js";
import type { ChatSession } from "./session.js";

export class SessionRegistry {
	private readonly bySurface = new Map<string, ChatSession>();

	/**
	 * Bind a session to a surface. A surface whose chat has ended can be
	 * reused; one with an active chat cannot.
	 */
	register(surfaceId: string, session: ChatSession): void {
		const existing = this.bySurface.get(surfaceId);
		if (existing && existing !== session && !existing.hasEnded()) {
			throw new Error(`Surface ${surfaceId} already has an active chat`);
		}
		this.bySurface.set(surfaceId, session);
	}

	get(surfaceId: string): ChatSession | undefined {
		return this.bySurface.get(surfaceId);
	}

	remove(surfaceId: string): boolean {
		return this.bySurface.delete(surfaceId);
	}

	/**
	 * The user closed a surface: abort its chat if still running and forget it.
	 */
	closeSurface(surfaceId: string): boolean {
		const session = this.bySurface.get(surfaceId);
		if (!session) return false;

		this.bySurface.delete(surfaceId);
		if (!session.hasEnded()) {
			logger.info(`[registry] Surface ${surfaceId} closed, aborting chat`);
			session.close("aborted");
		}
		return true;
	}

	sessions(): ChatSession[] {
		return Array.from(this.bySurface.values());
	}

	get size(): number {
		return this.bySurface.size;
	}
}
