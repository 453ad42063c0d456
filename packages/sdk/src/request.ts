/**
 * Selection request schema and validation
 */

import { z } from "zod";
import { InvalidRequestError } from "./errors.js";
import type { SelectionRequest } from "./types.js";

/**
 * Classic boundary: quotations of 160 bytes or fewer are "short"
 */
export const DEFAULT_SHORT_MAX = 160;

export const DEFAULT_LONG_THRESHOLD = DEFAULT_SHORT_MAX + 1;

export const selectionRequestSchema = z
  .object({
    filter: z.enum(["all", "long", "short"]).default("all"),
    longThreshold: z.number().int().min(0).default(DEFAULT_LONG_THRESHOLD),
    offensive: z.enum(["exclude", "include", "only"]).default("exclude"),
    equalProbability: z.boolean().default(false),
    pattern: z.string().optional(),
    ignoreCase: z.boolean().default(false),
    listSources: z.boolean().default(false),
  })
  .strict();

export type SelectionRequestInput = z.input<typeof selectionRequestSchema>;

/**
 * Validate and fill defaults
 * @throws InvalidRequestError listing each failing field
 */
export function validateRequest(input: unknown = {}): SelectionRequest {
  const result = selectionRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join(".") || "request";
      return `${field}: ${issue.message}`;
    });
    throw new InvalidRequestError("Invalid selection request", issues);
  }

  const request = result.data;
  if (request.ignoreCase && request.pattern === undefined) {
    throw new InvalidRequestError("Invalid selection request", ["ignoreCase: requires a pattern"]);
  }

  return Object.freeze(request);
}

export function defaultRequest(): SelectionRequest {
  return validateRequest({});
}
