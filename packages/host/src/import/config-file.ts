// ─── Config File ───────────────────────────────────────────────────
// Loads the validator configuration from a JSON file.

import { readFile } from "node:fs/promises";
import { safeParseValidatorConfig, type ValidatorConfig } from "@war-audit/shared";

import { formatZodIssues } from "./format-zod-issues.js";

/** Result of a config load attempt. Discriminated union. */
export type ConfigFileResult =
  | { readonly ok: true; readonly config: ValidatorConfig }
  | { readonly ok: false; readonly error: string };

/**
 * Reads a JSON config file and validates it with the Zod schema.
 * Missing fields take their defaults.
 *
 * @param filePath - Path to the .json config file.
 */
export async function loadValidatorConfig(filePath: string): Promise<ConfigFileResult> {
  if (!filePath.endsWith(".json")) {
    return { ok: false, error: "Config file must have a .json extension." };
  }

  // ── Read file contents ───────────────────────────────────────────
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error("[ConfigLoader] Read failed:", filePath, message);
    return { ok: false, error: `Failed to read file: ${message}` };
  }

  // ── Parse JSON ───────────────────────────────────────────────────
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "File is not valid JSON." };
  }

  // ── Validate against schema ──────────────────────────────────────
  const result = safeParseValidatorConfig(json);

  if (!result.success) {
    console.warn("[ConfigLoader] Invalid config:", filePath);
    return { ok: false, error: formatZodIssues(result.error.issues) };
  }

  return { ok: true, config: result.data };
}
