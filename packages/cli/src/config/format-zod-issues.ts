// ─── Zod Issue Formatter ───────────────────────────────────────────
// Converts Zod validation issues into a single line for stderr.
// Uses a minimal structural type to avoid a direct dependency on "zod".

/** Minimal shape of a Zod issue (path + message). */
interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * Renders each issue as `path: message`, joined by "; ". Issues on the
 * config object itself (empty path) are labelled `(root)`.
 *
 * @example
 * formatZodIssues([{ path: ["players"], message: "Expected number, received string" }])
 * // => "Validation failed: players: Expected number, received string"
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string {
  const details = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });

  return `Validation failed: ${details.join("; ")}`;
}
