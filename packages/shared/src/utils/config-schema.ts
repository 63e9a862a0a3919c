/**
 * Zod schema for codec options.
 */

import { z } from "zod";

export const DEFAULT_MAX_DEPTH = 64;

export const CodecConfigSchema = z.object({
  /** Deepest nesting of lists, maps and typed payloads inside one extension value. */
  maxDepth: z.number().int().min(1).max(1024).default(DEFAULT_MAX_DEPTH),
});

export type CodecConfig = z.infer<typeof CodecConfigSchema>;
