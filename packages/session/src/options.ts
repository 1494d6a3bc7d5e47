// ─── Session Options ───────────────────────────────────────────────

import { z } from "zod";
import { SnapshotError } from "./schema/snapshot";
import { formatZodIssues } from "./schema/format-zod-issues";

export const SessionManagerOptionsSchema = z.object({
  /** Show exact fractions (`1/3`) instead of decimals (`0.3333333333333333`). */
  showFractions: z.boolean().default(false),
  /** Mode tag given to new sessions. */
  defaultMode: z.string().min(1).default("STANDARD"),
});

export type SessionManagerOptions = z.infer<typeof SessionManagerOptionsSchema>;

/** Caller-facing shape: every field optional. */
export type SessionManagerOptionsInput = z.input<typeof SessionManagerOptionsSchema>;

/**
 * Validates options and fills in defaults.
 *
 * @throws {SnapshotError} listing every invalid field.
 */
export function parseSessionOptions(raw: unknown = {}): SessionManagerOptions {
  const result = SessionManagerOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new SnapshotError(formatZodIssues(result.error.issues));
  }
  return result.data;
}
