// ─── Validator Config Schema Tests ─────────────────────────────────
// Defaults, constraints and the throwing/safe parse variants.

import { describe, it, expect } from "vitest";
import {
  parseValidatorConfig,
  safeParseValidatorConfig,
  STANDARD_DECK_SIZE,
} from "../index";

describe("ValidatorConfigSchema", () => {
  // ── Defaults ─────────────────────────────────────────────────────

  describe("defaults", () => {
    it("fills in players 1 and 2 and the standard deck size", () => {
      const config = parseValidatorConfig({});

      expect(config).toEqual({ playerNumbers: [1, 2], maxCards: 52 });
      expect(config.maxCards).toBe(STANDARD_DECK_SIZE);
    });

    it("keeps explicit values", () => {
      const config = parseValidatorConfig({ playerNumbers: [1, 2, 3], maxCards: 104 });

      expect(config).toEqual({ playerNumbers: [1, 2, 3], maxCards: 104 });
    });

    it("returns a fresh default list on every parse", () => {
      const first = parseValidatorConfig({});
      first.playerNumbers.push(9);

      expect(parseValidatorConfig({}).playerNumbers).toEqual([1, 2]);
    });
  });

  // ── playerNumbers ────────────────────────────────────────────────

  describe("playerNumbers", () => {
    it("rejects an empty list", () => {
      const result = safeParseValidatorConfig({ playerNumbers: [] });

      expect(result.success).toBe(false);
    });

    it("rejects player 0", () => {
      const result = safeParseValidatorConfig({ playerNumbers: [0, 1] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.path).toEqual(["playerNumbers", 0]);
      }
    });

    it("rejects fractional player numbers", () => {
      expect(safeParseValidatorConfig({ playerNumbers: [1.5] }).success).toBe(false);
    });

    it("rejects repeated players", () => {
      const result = safeParseValidatorConfig({ playerNumbers: [1, 2, 1] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe(
          "playerNumbers must not repeat a player"
        );
      }
    });
  });

  // ── maxCards ─────────────────────────────────────────────────────

  describe("maxCards", () => {
    it("accepts zero", () => {
      expect(safeParseValidatorConfig({ maxCards: 0 }).success).toBe(true);
    });

    it("rejects negative counts", () => {
      expect(safeParseValidatorConfig({ maxCards: -1 }).success).toBe(false);
    });

    it("rejects non-numeric counts", () => {
      expect(safeParseValidatorConfig({ maxCards: "52" }).success).toBe(false);
    });
  });

  // ── Throwing variant ─────────────────────────────────────────────

  it("parseValidatorConfig throws on invalid input", () => {
    expect(() => parseValidatorConfig({ maxCards: -5 })).toThrow();
  });

  it("rejects a non-object root", () => {
    expect(safeParseValidatorConfig([1, 2]).success).toBe(false);
  });
});
