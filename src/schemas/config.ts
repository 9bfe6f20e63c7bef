/**
 * Zod schema for the user's config.json
 */

import { z } from "zod";

export const ConfigFileSchema = z.object({
  youtubeApiKey: z.string().min(1).optional(),
  mpvPath: z.string().min(1).optional(),
  mpvSocket: z.string().min(1).optional(),
  resolverPath: z.string().min(1).optional(),
  playlistFile: z.string().min(1).optional(),
  dedupePlaylist: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
