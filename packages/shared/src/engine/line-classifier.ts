// ─── Line Classifier ───────────────────────────────────────────────
// Turns one raw transcript line into a typed LineRecord. Total and
// stateless: every string classifies, unknown text as "malformed".

import {
  DEFAULT_PLAYER_NUMBERS,
  STANDARD_DECK_SIZE,
} from "@war-audit/schema";
import type { LineRecord, PlayerId, Rank, Suit } from "../types/index.js";
import { isRank, isSuit } from "../deck/index.js";

/** Options for a LineClassifier. */
export interface LineClassifierOptions {
  /** Player numbers a line may name. Defaults to 1 and 2. */
  readonly playerNumbers?: readonly PlayerId[];
  /** Largest card count a game winner line may report. Defaults to 52. */
  readonly maxCards?: number;
}

/**
 * A grammar rule: a pattern plus a builder that validates the captured
 * fields. A builder returning null sends classification on to the next rule.
 */
interface LineRule {
  readonly pattern: RegExp;
  readonly build: (groups: Readonly<Record<string, string>>) => LineRecord | null;
}

const PLAYER = String.raw`Player (?<player>\d+)`;
const CARD = String.raw`(?<rank>[A-Za-z]+) of (?<suit>[A-Za-z]+)`;
const ROUND = String.raw`Round (?<round>\d+)`;

/** Parses a run of ASCII digits. Values beyond the safe-integer range are rejected. */
function parseCount(digits: string | undefined): number | null {
  if (digits === undefined) return null;
  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : null;
}

function parseCard(
  groups: Readonly<Record<string, string>>
): { readonly rank: Rank; readonly suit: Suit } | null {
  const rank = groups.rank;
  const suit = groups.suit;
  if (rank === undefined || suit === undefined) return null;
  if (!isRank(rank) || !isSuit(suit)) return null;
  return { rank, suit };
}

/**
 * Classifies transcript lines against the fixed line grammar.
 * Rules are tried in priority order and the first rule whose builder
 * accepts the captured fields wins.
 */
export class LineClassifier {
  private readonly playerNumbers: ReadonlySet<PlayerId>;
  private readonly maxCards: number;
  private readonly rules: readonly LineRule[];

  constructor(options: LineClassifierOptions = {}) {
    this.playerNumbers = new Set(options.playerNumbers ?? DEFAULT_PLAYER_NUMBERS);
    this.maxCards = options.maxCards ?? STANDARD_DECK_SIZE;
    this.rules = this.buildRules();
  }

  classify(text: string): LineRecord {
    if (text.includes("\n")) {
      return { kind: "malformed", text };
    }

    const line = text.trim();
    if (line === "") {
      return { kind: "empty" };
    }

    for (const rule of this.rules) {
      const match = rule.pattern.exec(line);
      if (!match) continue;

      const record = rule.build(match.groups ?? {});
      if (record) return record;
    }

    return { kind: "malformed", text };
  }

  private player(digits: string | undefined): PlayerId | null {
    const player = parseCount(digits);
    return player !== null && this.playerNumbers.has(player) ? player : null;
  }

  private buildRules(): readonly LineRule[] {
    return [
      {
        pattern: new RegExp(`^${ROUND}$`),
        build: (g) => {
          const round = parseCount(g.round);
          return round === null ? null : { kind: "round", round };
        },
      },
      {
        pattern: new RegExp(`^${PLAYER}:$`),
        build: (g) => {
          const player = this.player(g.player);
          return player === null ? null : { kind: "player_label", player };
        },
      },
      {
        pattern: new RegExp(`^- ${CARD}$`),
        build: (g) => {
          const card = parseCard(g);
          return card ? { kind: "face_up_card", ...card } : null;
        },
      },
      {
        pattern: new RegExp(String.raw`^- ${CARD} \(face down\)$`),
        build: (g) => {
          const card = parseCard(g);
          return card ? { kind: "face_down_card", ...card } : null;
        },
      },
      {
        pattern: new RegExp(String.raw`^Round winner: ${PLAYER} \(${CARD}\)$`),
        build: (g) => {
          const player = this.player(g.player);
          const card = parseCard(g);
          if (player === null || !card) return null;
          return { kind: "round_winner", player, ...card };
        },
      },
      {
        pattern: /^Commencing war\.\.\.$/,
        build: () => ({ kind: "commencing_war" }),
      },
      {
        pattern: new RegExp(`^${ROUND}, War (?<war>\\d+)$`),
        build: (g) => {
          const round = parseCount(g.round);
          const warRound = parseCount(g.war);
          if (round === null || warRound === null) return null;
          return { kind: "war_round", round, warRound };
        },
      },
      {
        pattern: /^Continuing war\.\.\.$/,
        build: () => ({ kind: "continuing_war" }),
      },
      {
        pattern: new RegExp(`^${PLAYER} wins with (?<count>\\d+) cards in their deck$`),
        build: (g) => {
          const player = this.player(g.player);
          const cardCount = parseCount(g.count);
          if (player === null || cardCount === null) return null;
          if (cardCount < 0 || cardCount > this.maxCards) return null;
          return { kind: "game_winner", player, cardCount };
        },
      },
      {
        pattern: /^The game ended in a draw$/,
        build: () => ({ kind: "draw" }),
      },
    ];
  }
}

/**
 * Renders a record back into its transcript line. Inverse of `classify`
 * for every record except "malformed", which renders its original text.
 */
export function renderLine(record: LineRecord): string {
  switch (record.kind) {
    case "round":
      return `Round ${record.round}`;
    case "player_label":
      return `Player ${record.player}:`;
    case "face_up_card":
      return `- ${record.rank} of ${record.suit}`;
    case "face_down_card":
      return `- ${record.rank} of ${record.suit} (face down)`;
    case "round_winner":
      return `Round winner: Player ${record.player} (${record.rank} of ${record.suit})`;
    case "commencing_war":
      return "Commencing war...";
    case "war_round":
      return `Round ${record.round}, War ${record.warRound}`;
    case "continuing_war":
      return "Continuing war...";
    case "game_winner":
      return `Player ${record.player} wins with ${record.cardCount} cards in their deck`;
    case "draw":
      return "The game ended in a draw";
    case "empty":
      return "";
    case "malformed":
      return record.text;
  }
}

const defaultClassifier = new LineClassifier();

/** Classifies a line with the default two-player, 52-card grammar. */
export function classify(text: string): LineRecord {
  return defaultClassifier.classify(text);
}
