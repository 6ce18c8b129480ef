import type { ZodError } from "zod";

/**
 * One line per zod issue, prefixed with the dotted key that failed.
 *
 * @example formatIssues(error) → ["repository: Required", "results.0.integration: Required"]
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
