// ─── Config Issue Messages ─────────────────────────────────────────
// Flattens the issues of a rejected validator config into one line for
// the CLI and the config loader. Typed structurally so the host needs
// no direct "zod" import.

interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * One `field.path: message` entry per issue, separated by "; ", behind
 * a "Validation failed: " prefix. An issue on the config object itself
 * is labelled `(root)`.
 *
 * @example
 * formatZodIssues([{ path: ["maxCards"], message: "Expected number, received string" }])
 * // => "Validation failed: maxCards: Expected number, received string"
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string {
  const entries = issues.map(({ path, message }) => {
    const field = path.length === 0 ? "(root)" : path.join(".");
    return `${field}: ${message}`;
  });

  return `Validation failed: ${entries.join("; ")}`;
}
