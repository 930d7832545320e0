import { describe, it, expect } from "vitest";
import {
  CLOSING_RULES,
  ONGOING_RULES,
  ProtocolStateMachine,
  type TransitionResult,
} from "./protocol-machine.js";
import type { LineRecord, ProtocolState, WarState } from "../types/index.js";

// ─── Test Helpers ──────────────────────────────────────────────────

const ROUND: LineRecord = { kind: "round", round: 1 };
const WAR_ROUND: LineRecord = { kind: "war_round", round: 1, warRound: 1 };
const PLAYER_1: LineRecord = { kind: "player_label", player: 1 };
const PLAYER_2: LineRecord = { kind: "player_label", player: 2 };
const FACE_UP: LineRecord = { kind: "face_up_card", rank: "Five", suit: "Clubs" };
const FACE_DOWN: LineRecord = { kind: "face_down_card", rank: "Six", suit: "Clubs" };
const WINNER: LineRecord = { kind: "round_winner", player: 1, rank: "Five", suit: "Clubs" };
const COMMENCING: LineRecord = { kind: "commencing_war" };
const CONTINUING: LineRecord = { kind: "continuing_war" };
const EMPTY: LineRecord = { kind: "empty" };

function advance(to: ProtocolState): TransitionResult {
  return { kind: "advance", nextState: to };
}

const ILLEGAL: TransitionResult = { kind: "illegal" };

/** Feeds records through a fresh machine and returns the visited states. */
function walk(steps: readonly (readonly [LineRecord, WarState])[]): ProtocolState[] {
  const machine = new ProtocolStateMachine();
  return steps.map(([record, war]) => {
    const result = machine.advance(record, war, null);
    expect(result.kind).toBe("advance");
    return machine.state;
  });
}

// ─── Game In Progress ──────────────────────────────────────────────

describe("ProtocolStateMachine", () => {
  it("starts at the round header", () => {
    expect(new ProtocolStateMachine().state).toBe("regular_round");
  });

  describe("regular round", () => {
    it("walks header, both players and the winner back to the header", () => {
      expect(
        walk([
          [ROUND, "no_war"],
          [PLAYER_1, "no_war"],
          [FACE_UP, "no_war"],
          [PLAYER_2, "no_war"],
          [FACE_UP, "no_war"],
          [WINNER, "no_war"],
        ])
      ).toEqual([
        "regular_player_1_label",
        "regular_player_1_card",
        "regular_player_2_label",
        "regular_player_2_card",
        "round_winner",
        "regular_round",
      ]);
    });

    it("branches on the war state after the second card", () => {
      const machine = new ProtocolStateMachine();
      const from: ProtocolState = "regular_player_2_card";

      expect(machine.next(from, FACE_UP, "no_war", null)).toEqual(advance("round_winner"));
      expect(machine.next(from, FACE_UP, "war_start", null)).toEqual(advance("commencing_war"));
      expect(machine.next(from, FACE_UP, "war_ongoing", null)).toEqual(advance("continuing_war"));
      expect(machine.next(from, FACE_UP, "war_end", null)).toEqual(advance("round_winner"));
    });

    it("requires the labels in player order", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("regular_player_1_label", PLAYER_2, "no_war", null)).toEqual(ILLEGAL);
      expect(machine.next("regular_player_2_label", PLAYER_1, "no_war", null)).toEqual(ILLEGAL);
    });

    it("rejects a round winner while a war is pending", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("round_winner", WINNER, "war_start", null)).toEqual(ILLEGAL);
      expect(machine.next("commencing_war", WINNER, "war_ongoing", null)).toEqual(ILLEGAL);
    });

    it("rejects face-down cards outside a war", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("regular_player_1_card", FACE_DOWN, "no_war", null)).toEqual(ILLEGAL);
    });
  });

  describe("war rounds", () => {
    it("walks a war round that ends the war", () => {
      const machine = new ProtocolStateMachine("commencing_war");
      const steps: [LineRecord, WarState][] = [
        [COMMENCING, "war_ongoing"],
        [WAR_ROUND, "war_ongoing"],
        [PLAYER_1, "war_ongoing"],
        [FACE_UP, "war_ongoing"],
        [FACE_DOWN, "war_ongoing"],
        [PLAYER_2, "war_ongoing"],
        [FACE_UP, "war_ongoing"],
        [FACE_DOWN, "war_end"],
      ];

      const visited = steps.map(([record, war]) => {
        machine.advance(record, war, null);
        return machine.state;
      });

      expect(visited).toEqual([
        "war_round",
        "war_player_1_label",
        "war_player_1_card_up",
        "war_player_1_card_down",
        "war_player_2_label",
        "war_player_2_card_up",
        "war_player_2_card_down",
        "round_winner",
      ]);
    });

    it("loops through continuing war on another tie", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("war_player_2_card_down", FACE_DOWN, "war_ongoing", null)).toEqual(
        advance("continuing_war")
      );
      expect(machine.next("continuing_war", CONTINUING, "war_ongoing", null)).toEqual(
        advance("war_round")
      );
    });

    it("expects the face-up card before the face-down card", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("war_player_1_card_up", FACE_DOWN, "war_ongoing", null)).toEqual(ILLEGAL);
      expect(machine.next("war_player_1_card_down", FACE_UP, "war_ongoing", null)).toEqual(ILLEGAL);
    });
  });

  // ── Closing ──────────────────────────────────────────────────────

  describe("closing lines", () => {
    it("routes the next header to the derived outcome", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("regular_round", ROUND, "no_war", "player_1_win")).toEqual(
        advance("winner_player_1")
      );
      expect(machine.next("regular_round", ROUND, "no_war", "player_2_win")).toEqual(
        advance("winner_player_2")
      );
      expect(machine.next("war_round", WAR_ROUND, "war_ongoing", "draw")).toEqual(advance("draw"));
    });

    it("accepts only the matching verdict line", () => {
      const machine = new ProtocolStateMachine();
      const p1Wins: LineRecord = { kind: "game_winner", player: 1, cardCount: 52 };
      const p2Wins: LineRecord = { kind: "game_winner", player: 2, cardCount: 52 };
      const draw: LineRecord = { kind: "draw" };

      expect(machine.next("winner_player_1", p1Wins, "no_war", "player_1_win")).toEqual(advance("done"));
      expect(machine.next("winner_player_1", p2Wins, "no_war", "player_1_win")).toEqual(ILLEGAL);
      expect(machine.next("winner_player_2", draw, "no_war", "player_2_win")).toEqual(ILLEGAL);
      expect(machine.next("draw", draw, "no_war", "draw")).toEqual(advance("done"));
      expect(machine.next("draw", p1Wins, "no_war", "draw")).toEqual(ILLEGAL);
    });

    it("rejects regular lines once an outcome exists", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("regular_player_1_label", PLAYER_1, "no_war", "player_1_win")).toEqual(
        ILLEGAL
      );
    });

    it("accepts nothing after the verdict line but empty lines", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("done", ROUND, "no_war", "player_1_win")).toEqual(ILLEGAL);
      expect(machine.next("done", EMPTY, "no_war", "player_1_win")).toEqual(advance("done"));
    });
  });

  // ── Table Mechanics ──────────────────────────────────────────────

  describe("tables", () => {
    it("self-loops on empty lines in every state", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.next("war_player_2_label", EMPTY, "war_ongoing", null)).toEqual(
        advance("war_player_2_label")
      );
    });

    it("does not commit an illegal transition", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.advance(PLAYER_1, "no_war", null)).toEqual(ILLEGAL);
      expect(machine.state).toBe("regular_round");
    });

    it("rejects duplicate rules at construction", () => {
      const [first] = ONGOING_RULES;
      expect(first).toBeDefined();
      if (!first) return;

      expect(() => new ProtocolStateMachine("regular_round", [first, first], CLOSING_RULES)).toThrow(
        'Duplicate transition rule: "regular_round/round/no_war"'
      );
    });

    it("reports which line kinds can leave a state", () => {
      const machine = new ProtocolStateMachine();

      expect(machine.expects("regular_round", "round")).toBe(true);
      expect(machine.expects("regular_round", "player_label")).toBe(false);
      expect(machine.expects("war_round", "war_round")).toBe(true);
      expect(machine.expects("commencing_war", "round_winner")).toBe(false);
      expect(machine.expects("winner_player_2", "game_winner")).toBe(true);
      expect(machine.expects("done", "empty")).toBe(true);
    });
  });
});
