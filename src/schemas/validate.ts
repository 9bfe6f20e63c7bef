import type { z } from "zod";
import { getLogger } from "../utils/Logger";

const logger = getLogger("Validation");

// ============================================================================
// Helper: Safe Parse with Logging
// ============================================================================

export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T | null {
  const result = schema.safeParse(data);

  if (!result.success) {
    logger.debug(`${context} failed validation:`, result.error.issues);
    return null;
  }

  return result.data;
}
