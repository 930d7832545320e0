// ─── Config Validation ─────────────────────────────────────────────
// Zod schema for the validator configuration file.
// This is the "parse boundary" — raw JSON enters, typed config exits.

import { z } from "zod";

/** Player numbers a transcript may mention by default. */
export const DEFAULT_PLAYER_NUMBERS: readonly number[] = [1, 2];

/** Size of the standard deck; the largest card count a winner can report. */
export const STANDARD_DECK_SIZE = 52;

export const ValidatorConfigSchema = z.object({
  playerNumbers: z
    .array(z.number().int().min(1))
    .min(1)
    .refine(
      (players) => new Set(players).size === players.length,
      { message: "playerNumbers must not repeat a player" }
    )
    .default(() => [...DEFAULT_PLAYER_NUMBERS]),
  maxCards: z.number().int().min(0).default(STANDARD_DECK_SIZE),
});

/** Validator config after defaults are applied. */
export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>;

/**
 * Parses raw JSON into a validated config with defaults filled in.
 * Throws a ZodError with detailed issues.
 */
export function parseValidatorConfig(raw: unknown): ValidatorConfig {
  return ValidatorConfigSchema.parse(raw);
}

/**
 * Safe parse variant — returns a discriminated result instead of throwing.
 */
export function safeParseValidatorConfig(
  raw: unknown
): z.SafeParseReturnType<unknown, ValidatorConfig> {
  return ValidatorConfigSchema.safeParse(raw);
}
