// Config parsing lives in the schema package; re-exported for engine consumers.
export {
  ValidatorConfigSchema,
  parseValidatorConfig,
  safeParseValidatorConfig,
  DEFAULT_PLAYER_NUMBERS,
  STANDARD_DECK_SIZE,
} from "@war-audit/schema";
