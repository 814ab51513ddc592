import { z } from "zod";

import { TJSONConfigError } from "../errors/types";
import type { ParseOptions } from "./types";

export const DEFAULT_MAX_DEPTH = 512;
export const DEFAULT_MAX_INPUT_LENGTH = 16 * 1024 * 1024;

const parseOptionsSchema = z.object({
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  maxInputLength: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_INPUT_LENGTH),
  startOffset: z.number().int().nonnegative().default(0),
});

const maxDepthSchema = z.number().int().positive();

export type ResolvedParseOptions = z.infer<typeof parseOptionsSchema>;

export function resolveParseOptions(
  options: ParseOptions = {}
): ResolvedParseOptions {
  const result = parseOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new TJSONConfigError(
      `Invalid parse options: ${z.prettifyError(result.error)}`,
      result.error
    );
  }
  return result.data;
}

export function resolveMaxDepth(maxDepth: number): number {
  const result = maxDepthSchema.safeParse(maxDepth);
  if (!result.success) {
    throw new TJSONConfigError(
      `Invalid max depth: ${z.prettifyError(result.error)}`,
      result.error
    );
  }
  return result.data;
}
