// ─── Protocol State Machine ────────────────────────────────────────
// A deterministic automaton over transcript lines. Two explicit rule
// tables: one for the game in progress (keyed by war state) and one for
// the closing lines once the game's end is derivable (keyed by outcome).
// A triple with no rule is illegal; there is no default transition.

import type {
  GameEndOutcome,
  LineKind,
  LineRecord,
  PlayerId,
  ProtocolState,
  WarState,
} from "../types/index.js";

/** A single row of a transition table. */
export interface TransitionRule<C extends string> {
  readonly from: ProtocolState;
  readonly on: LineKind;
  /** War state or outcome the rule applies under; "any" matches all. */
  readonly when: C | "any";
  readonly to: ProtocolState;
  /** Player the line must name, for lines that name one. */
  readonly player?: PlayerId;
}

/** The result of a transition. Discriminated union. */
export type TransitionResult =
  | { readonly kind: "advance"; readonly nextState: ProtocolState }
  | { readonly kind: "illegal" };

export const INITIAL_PROTOCOL_STATE: ProtocolState = "regular_round";

/** Rules while no game-end outcome has been derived. */
export const ONGOING_RULES: readonly TransitionRule<WarState>[] = [
  // Regular round
  { from: "regular_round", on: "round", when: "no_war", to: "regular_player_1_label" },
  { from: "regular_player_1_label", on: "player_label", when: "no_war", to: "regular_player_1_card", player: 1 },
  { from: "regular_player_1_card", on: "face_up_card", when: "no_war", to: "regular_player_2_label" },
  { from: "regular_player_2_label", on: "player_label", when: "no_war", to: "regular_player_2_card", player: 2 },
  { from: "regular_player_2_card", on: "face_up_card", when: "no_war", to: "round_winner" },
  { from: "regular_player_2_card", on: "face_up_card", when: "war_start", to: "commencing_war" },
  { from: "regular_player_2_card", on: "face_up_card", when: "war_ongoing", to: "continuing_war" },
  { from: "regular_player_2_card", on: "face_up_card", when: "war_end", to: "round_winner" },
  { from: "round_winner", on: "round_winner", when: "no_war", to: "regular_round" },
  // War
  { from: "commencing_war", on: "commencing_war", when: "war_ongoing", to: "war_round" },
  { from: "war_round", on: "war_round", when: "war_ongoing", to: "war_player_1_label" },
  { from: "war_player_1_label", on: "player_label", when: "war_ongoing", to: "war_player_1_card_up", player: 1 },
  { from: "war_player_1_card_up", on: "face_up_card", when: "war_ongoing", to: "war_player_1_card_down" },
  { from: "war_player_1_card_down", on: "face_down_card", when: "war_ongoing", to: "war_player_2_label" },
  { from: "war_player_2_label", on: "player_label", when: "war_ongoing", to: "war_player_2_card_up", player: 2 },
  { from: "war_player_2_card_up", on: "face_up_card", when: "war_ongoing", to: "war_player_2_card_down" },
  { from: "war_player_2_card_down", on: "face_down_card", when: "war_ongoing", to: "continuing_war" },
  { from: "war_player_2_card_down", on: "face_down_card", when: "war_end", to: "round_winner" },
  { from: "continuing_war", on: "continuing_war", when: "war_ongoing", to: "war_round" },
];

/** Rules once the outcome is known: one header, then the matching verdict line. */
export const CLOSING_RULES: readonly TransitionRule<GameEndOutcome>[] = [
  { from: "regular_round", on: "round", when: "player_1_win", to: "winner_player_1" },
  { from: "regular_round", on: "round", when: "player_2_win", to: "winner_player_2" },
  { from: "regular_round", on: "round", when: "draw", to: "draw" },
  { from: "war_round", on: "war_round", when: "player_1_win", to: "winner_player_1" },
  { from: "war_round", on: "war_round", when: "player_2_win", to: "winner_player_2" },
  { from: "war_round", on: "war_round", when: "draw", to: "draw" },
  { from: "winner_player_1", on: "game_winner", when: "any", to: "done", player: 1 },
  { from: "winner_player_2", on: "game_winner", when: "any", to: "done", player: 2 },
  { from: "draw", on: "draw", when: "any", to: "done" },
];

type RuleTable<C extends string> = ReadonlyMap<string, TransitionRule<C>>;

function ruleKey(from: ProtocolState, on: LineKind, when: string): string {
  return `${from}/${on}/${when}`;
}

function buildTable<C extends string>(rules: readonly TransitionRule<C>[]): RuleTable<C> {
  const table = new Map<string, TransitionRule<C>>();
  for (const rule of rules) {
    const key = ruleKey(rule.from, rule.on, rule.when);
    if (table.has(key)) {
      throw new Error(`Duplicate transition rule: "${key}"`);
    }
    table.set(key, rule);
  }
  return table;
}

/** The player a line names, if it names one. */
function namedPlayer(record: LineRecord): PlayerId | undefined {
  switch (record.kind) {
    case "player_label":
    case "round_winner":
    case "game_winner":
      return record.player;
    default:
      return undefined;
  }
}

/**
 * Transition function plus the current state. `next` is pure; `advance`
 * commits the transition when it is legal.
 */
export class ProtocolStateMachine {
  private readonly ongoing: RuleTable<WarState>;
  private readonly closing: RuleTable<GameEndOutcome>;
  private readonly expected: ReadonlySet<string>;
  private current: ProtocolState;

  constructor(
    initialState: ProtocolState = INITIAL_PROTOCOL_STATE,
    ongoingRules: readonly TransitionRule<WarState>[] = ONGOING_RULES,
    closingRules: readonly TransitionRule<GameEndOutcome>[] = CLOSING_RULES
  ) {
    this.ongoing = buildTable(ongoingRules);
    this.closing = buildTable(closingRules);
    this.expected = new Set(
      [...ongoingRules, ...closingRules].map((rule) => `${rule.from}/${rule.on}`)
    );
    this.current = initialState;
  }

  get state(): ProtocolState {
    return this.current;
  }

  next(
    state: ProtocolState,
    record: LineRecord,
    warState: WarState,
    outcome: GameEndOutcome | null
  ): TransitionResult {
    if (record.kind === "empty") {
      return { kind: "advance", nextState: state };
    }

    const rule =
      outcome !== null
        ? this.closing.get(ruleKey(state, record.kind, outcome)) ??
          this.closing.get(ruleKey(state, record.kind, "any"))
        : this.ongoing.get(ruleKey(state, record.kind, warState)) ??
          this.ongoing.get(ruleKey(state, record.kind, "any"));

    if (!rule) {
      return { kind: "illegal" };
    }
    if (rule.player !== undefined && namedPlayer(record) !== rule.player) {
      return { kind: "illegal" };
    }
    return { kind: "advance", nextState: rule.to };
  }

  /** Applies `next` to the current state and commits it if legal. */
  advance(
    record: LineRecord,
    warState: WarState,
    outcome: GameEndOutcome | null
  ): TransitionResult {
    const result = this.next(this.current, record, warState, outcome);
    if (result.kind === "advance") {
      this.current = result.nextState;
    }
    return result;
  }

  /**
   * Whether a line of this kind can leave `state` under any war state or
   * outcome. Empty lines are always expected.
   */
  expects(state: ProtocolState, kind: LineKind): boolean {
    return kind === "empty" || this.expected.has(`${state}/${kind}`);
  }
}
