// ─── Zod Issue Formatter ───────────────────────────────────────────

import type { ZodIssue } from "zod";

/**
 * Renders issues as `path: message` pairs joined by "; ". An issue on
 * the value itself is labelled `(root)`.
 *
 * @example
 * formatZodIssues([{ code: "custom", path: ["sessions", 0, "id"], message: "Required" }])
 * // => "Validation failed: sessions.0.id: Required"
 */
export function formatZodIssues(issues: readonly ZodIssue[]): string {
  const details = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return `Validation failed: ${details.join("; ")}`;
}
