import { LRUCache } from "lru-cache";
import type { SiciMode } from "../sici/index.js";
import type { ToolResponseEnvelope } from "../types.js";

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/**
 * Parse results keyed by mode and raw input. Parsing is deterministic, so
 * entries never go stale.
 */
export class ParseCache {
	private readonly cache: LRUCache<string, ToolResponseEnvelope>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 1000) {
		this.cache = new LRUCache<string, ToolResponseEnvelope>({ max: maxEntries });
	}

	private static key(mode: SiciMode, raw: string): string {
		return `${mode}\u0000${raw}`;
	}

	get(mode: SiciMode, raw: string): ToolResponseEnvelope | undefined {
		const result = this.cache.get(ParseCache.key(mode, raw));
		if (result !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return result;
	}

	set(mode: SiciMode, raw: string, envelope: ToolResponseEnvelope): void {
		this.cache.set(ParseCache.key(mode, raw), envelope);
	}

	stats(): CacheStats {
		return {
			size: this.cache.size,
			maxSize: this.cache.max,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	clear(): void {
		this.cache.clear();
		this.hitCount = 0;
		this.missCount = 0;
	}
}
