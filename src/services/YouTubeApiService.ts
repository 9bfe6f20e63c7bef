/**
 * YouTube Data API v3 Service
 * Video search and duration lookup, with validated responses and caching
 */

import type { z } from "zod";
import { API_LIMITS, CACHE_CONFIG, YOUTUBE_API_BASE } from "../config/constants";
import { ApiError, ConfigError } from "../errors";
import {
	ApiErrorResponseSchema,
	safeValidate,
	SearchResponseSchema,
	VideosResponseSchema,
} from "../schemas";
import type { PlaylistEntry } from "../types";
import { decodeHtmlEntities, getLogger } from "../utils";
import { CacheKeys, CacheService, CacheTTL } from "./CacheService";

const logger = getLogger("YouTubeApiService");

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface YouTubeApiConfig {
	apiKey: string | undefined;
	baseUrl: string;
	fetch: FetchLike;
}

export interface ISearchService {
	search(keyword: string): Promise<PlaylistEntry[]>;
	lookupDuration(videoId: string): Promise<number>;
}

const ISO_DURATION = /^P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

/**
 * Parse an ISO-8601 duration such as "PT1H2M3S" into milliseconds.
 * Returns 0 for anything it does not understand.
 */
export function parseIsoDuration(value: string): number {
	const match = ISO_DURATION.exec(value.trim());
	if (!match) {
		return 0;
	}

	const [days, hours, minutes, seconds] = match
		.slice(1)
		.map((part) => (part === undefined ? 0 : Number.parseInt(part, 10)));
	return (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000;
}

export class YouTubeApiService implements ISearchService {
	private config: YouTubeApiConfig;
	private searchCache = new CacheService<PlaylistEntry[]>({
		ttl: CacheTTL.SHORT,
		cleanupIntervalMs: CACHE_CONFIG.CLEANUP_INTERVAL_MS,
	});
	private durationCache = new CacheService<number>({
		ttl: CacheTTL.LONG,
		cleanupIntervalMs: CACHE_CONFIG.CLEANUP_INTERVAL_MS,
	});

	constructor(config: Partial<YouTubeApiConfig> = {}) {
		this.config = {
			apiKey: undefined,
			baseUrl: YOUTUBE_API_BASE,
			fetch: (url, init) => fetch(url, init),
			...config,
		};
	}

	/**
	 * Make an API request and validate the response body
	 */
	private async request<T>(
		endpoint: string,
		params: Record<string, string>,
		validator: z.ZodType<T, z.ZodTypeDef, unknown>,
	): Promise<T> {
		if (!this.config.apiKey) {
			throw new ConfigError("YOUTUBE_API_KEY is not set");
		}

		const query = new URLSearchParams({ ...params, key: this.config.apiKey });
		const response = await this.config.fetch(`${this.config.baseUrl}${endpoint}?${query}`);

		if (!response.ok) {
			throw new ApiError(await this.describeFailure(response), response.status);
		}

		let data: unknown;
		try {
			data = await response.json();
		} catch (error) {
			throw new ApiError(`Unreadable response from ${endpoint}`, response.status, {
				cause: error,
			});
		}

		const validated = safeValidate(validator, data, endpoint);
		if (!validated) {
			throw new ApiError(`Invalid API response from ${endpoint}`, response.status);
		}
		return validated;
	}

	private async describeFailure(response: Response): Promise<string> {
		const body = await response.text();
		let parsed: unknown = null;
		try {
			parsed = JSON.parse(body);
		} catch (error) {
			logger.debug("Error body is not JSON:", error);
		}
		const apiError = safeValidate(ApiErrorResponseSchema, parsed, "error body");
		return `API error ${response.status}: ${apiError?.error.message ?? (body.trim() || response.statusText)}`;
	}

	// ─────────────────────────────────────────────────────────────
	// Search
	// ─────────────────────────────────────────────────────────────

	/**
	 * Search videos by relevance. Items without a snippet or video id
	 * (channels, playlists) are left out.
	 */
	async search(keyword: string): Promise<PlaylistEntry[]> {
		return this.searchCache.getOrFetch(CacheKeys.search(keyword), async () => {
			const data = await this.request(
				"/search",
				{
					part: "snippet",
					order: "relevance",
					type: "video",
					maxResults: String(API_LIMITS.SEARCH_RESULTS),
					q: keyword,
				},
				SearchResponseSchema,
			);

			const entries: PlaylistEntry[] = [];
			for (const item of data.items) {
				if (item.snippet && item.id.videoId) {
					entries.push({
						id: item.id.videoId,
						title: decodeHtmlEntities(item.snippet.title),
					});
				}
			}

			logger.debug(`Search "${keyword}" returned ${entries.length} videos`);
			return entries;
		});
	}

	// ─────────────────────────────────────────────────────────────
	// Video details
	// ─────────────────────────────────────────────────────────────

	/**
	 * Duration of a video in milliseconds
	 */
	async lookupDuration(videoId: string): Promise<number> {
		return this.durationCache.getOrFetch(CacheKeys.duration(videoId), async () => {
			const data = await this.request(
				"/videos",
				{ id: videoId, part: "contentDetails" },
				VideosResponseSchema,
			);

			const duration = data.items[0]?.contentDetails?.duration;
			if (duration === undefined) {
				throw new ApiError(`No duration for video ${videoId}`);
			}
			return parseIsoDuration(duration);
		});
	}

	dispose(): void {
		this.searchCache.dispose();
		this.durationCache.dispose();
	}
}
