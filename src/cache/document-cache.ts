import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import type { BibDocument } from "../model/document";
import type { ParseOptions } from "../parser/index";

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/** Cache key for a source text parsed under the given options. */
export function documentKey(source: string, options: ParseOptions = {}): string {
	return createHash("sha256")
		.update(JSON.stringify([options.mode, options.duplicateKeys, options.maxDepth]))
		.update("\0")
		.update(source)
		.digest("hex");
}

/**
 * Parsed documents by source hash. Callers get the cached instance back,
 * so they must treat it as read-only.
 */
export class DocumentCache {
	private readonly cache: LRUCache<string, BibDocument>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 100) {
		this.cache = new LRUCache<string, BibDocument>({ max: maxEntries });
	}

	get(key: string): BibDocument | undefined {
		const result = this.cache.get(key);
		if (result !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return result;
	}

	set(key: string, document: BibDocument): void {
		this.cache.set(key, document);
	}

	/** Cached document for `source`, parsing it with `parse` on a miss. */
	getOrParse(
		source: string,
		options: ParseOptions,
		parse: (source: string, options: ParseOptions) => BibDocument,
	): BibDocument {
		const key = documentKey(source, options);
		const cached = this.get(key);
		if (cached) return cached;
		const document = parse(source, options);
		this.set(key, document);
		return document;
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
