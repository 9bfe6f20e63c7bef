/**
 * Zod schema for lines read from the mpv JSON IPC socket
 * Events carry `event`; command replies carry `error` and `data` instead.
 */

import { z } from "zod";

export const MpvLineSchema = z.object({
  event: z.string().optional(),
  reason: z.string().optional().catch(undefined),
  error: z.string().optional(),
  data: z.unknown().optional(),
  request_id: z.number().optional(),
}).passthrough();

export type MpvLine = z.infer<typeof MpvLineSchema>;
