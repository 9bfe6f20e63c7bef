/**
 * Zod schemas for YouTube Data API v3 responses
 * Only the fields the app reads are checked; everything else passes through.
 */

import { z } from "zod";

// ============================================================================
// search.list
// ============================================================================

const SearchItemSchema = z.object({
  id: z.object({
    kind: z.string().optional(),
    videoId: z.string().optional(),
  }).passthrough(),
  snippet: z.object({
    title: z.string(),
    channelTitle: z.string().optional(),
  }).passthrough().optional(),
}).passthrough();

export const SearchResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z.array(SearchItemSchema).default([]),
}).passthrough();

export type SearchItem = z.infer<typeof SearchItemSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;

// ============================================================================
// videos.list (part=contentDetails)
// ============================================================================

const VideoItemSchema = z.object({
  id: z.string().optional(),
  contentDetails: z.object({
    duration: z.string(),
  }).passthrough().optional(),
}).passthrough();

export const VideosResponseSchema = z.object({
  items: z.array(VideoItemSchema).default([]),
}).passthrough();

export type VideosResponse = z.infer<typeof VideosResponseSchema>;

// ============================================================================
// Error body
// ============================================================================

export const ApiErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
  }).passthrough(),
}).passthrough();

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
