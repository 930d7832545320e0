export {
  ValidatorConfigSchema,
  parseValidatorConfig,
  safeParseValidatorConfig,
  DEFAULT_PLAYER_NUMBERS,
  STANDARD_DECK_SIZE,
  type ValidatorConfig,
} from "./validation";
