/**
 * Cache Service
 * In-memory caching with TTL and invalidation support
 */

import { CACHE_CONFIG } from "../config/constants";

export interface CacheEntry<T> {
	data: T;
	timestamp: number;
	ttl: number; // Time to live in milliseconds
}

export interface CacheOptions {
	ttl?: number; // Default TTL in milliseconds
	/** Periodically drop expired entries; the timer never keeps the process alive */
	cleanupIntervalMs?: number;
	now?: () => number;
}

/**
 * Cache with TTL and invalidation, holding values of one type
 */
export class CacheService<V> {
	private cache: Map<string, CacheEntry<V>> = new Map();
	private defaultTTL: number;
	private now: () => number;
	private cleanupTimer: NodeJS.Timeout | null = null;

	constructor(options: CacheOptions = {}) {
		this.defaultTTL = options.ttl ?? CACHE_CONFIG.DEFAULT_TTL_MS;
		this.now = options.now ?? Date.now;

		if (options.cleanupIntervalMs) {
			this.cleanupTimer = setInterval(() => this.cleanup(), options.cleanupIntervalMs);
			this.cleanupTimer.unref();
		}
	}

	/**
	 * Store data in cache with optional custom TTL
	 */
	set(key: string, data: V, ttl?: number): void {
		this.cache.set(key, {
			data,
			timestamp: this.now(),
			ttl: ttl ?? this.defaultTTL,
		});
	}

	/**
	 * Cached value, or undefined if not found or expired
	 */
	get(key: string): V | undefined {
		const entry = this.cache.get(key);
		if (!entry) {
			return undefined;
		}

		if (this.isExpired(entry)) {
			this.cache.delete(key);
			return undefined;
		}

		return entry.data;
	}

	has(key: string): boolean {
		const entry = this.cache.get(key);
		return entry !== undefined && !this.isExpired(entry);
	}

	clear(): void {
		this.cache.clear();
	}

	get size(): number {
		return this.cache.size;
	}

	/**
	 * Remove expired entries
	 */
	cleanup(): void {
		for (const [key, entry] of Array.from(this.cache.entries())) {
			if (this.isExpired(entry)) {
				this.cache.delete(key);
			}
		}
	}

	/**
	 * Get or fetch pattern:
	 * - Try to get from cache
	 * - If not found, fetch using provided function
	 * - Store in cache and return
	 * A rejected fetch stores nothing.
	 */
	async getOrFetch(key: string, fetchFn: () => Promise<V>, ttl?: number): Promise<V> {
		if (this.has(key)) {
			const cached = this.get(key);
			if (cached !== undefined) {
				return cached;
			}
		}

		const data = await fetchFn();
		this.set(key, data, ttl);
		return data;
	}

	/**
	 * Stop the cleanup timer and drop all entries
	 */
	dispose(): void {
		if (this.cleanupTimer) {
			clearInterval(this.cleanupTimer);
			this.cleanupTimer = null;
		}
		this.cache.clear();
	}

	private isExpired(entry: CacheEntry<V>): boolean {
		return this.now() - entry.timestamp > entry.ttl;
	}
}

/**
 * Cache key builders for consistency
 */
export const CacheKeys = {
	search: (keyword: string) => `search:${keyword.trim().toLowerCase()}`,
	duration: (videoId: string) => `duration:${videoId}`,
} as const;

export { CACHE_TTL as CacheTTL } from "../config/constants";
