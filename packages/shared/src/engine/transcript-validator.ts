// ─── Transcript Validator ──────────────────────────────────────────
// Drives the classifier, deck tracker, trick comparer and protocol
// machine over a transcript, one line at a time, and stops at the
// first inconsistency. One instance validates exactly one transcript.

import type {
  Card,
  CardLine,
  GameEndOutcome,
  LineRecord,
  PlayerId,
  ProtocolState,
  RoundWinnerLine,
  TranscriptVerdict,
  ValidationErrorKind,
  WarState,
} from "../types/index.js";
import { formatCard, sameCard } from "../deck/index.js";
import { LineClassifier, renderLine, type LineClassifierOptions } from "./line-classifier.js";
import { DeckConsistencyTracker, standardDeckSeeds, type DeckSeed } from "./deck-tracker.js";
import { TrickComparer } from "./trick-comparer.js";
import { ProtocolStateMachine } from "./protocol-machine.js";

/** Options for a TranscriptValidator. */
export interface TranscriptValidatorOptions {
  /** Grammar options for the validator's own classifier. */
  readonly classifier?: LineClassifierOptions;
  /** Starting decks of players 1 and 2. Defaults to 26 cards each. */
  readonly decks?: readonly DeckSeed[];
}

/** Counters and derived state of a run, for inspection after `validate`. */
export interface ValidationProgress {
  readonly round: number;
  readonly warRound: number;
  readonly warState: WarState;
  readonly outcome: GameEndOutcome | null;
  readonly state: ProtocolState;
  readonly remainingCounts: ReadonlyMap<PlayerId, number>;
  readonly cardsInPlay: readonly Card[];
}

/** Error thrown when a validator instance is asked to validate a second transcript. */
export class ValidatorReuseError extends Error {
  constructor() {
    super("TranscriptValidator instances validate one transcript; construct a new one per run");
    this.name = "ValidatorReuseError";
  }
}

interface LineFailure {
  readonly kind: ValidationErrorKind;
  readonly message: string;
}

const PLAYERS: readonly PlayerId[] = [1, 2];

/** Cards needed to play one more regular round, and one more war round. */
const ROUND_DRAWS = 0;
const WAR_ROUND_DRAWS = 2;

/** Whose card a card line is, decided by the protocol state alone. */
const PLAYER_TO_PLAY: Partial<Record<ProtocolState, PlayerId>> = {
  regular_player_1_card: 1,
  war_player_1_card_up: 1,
  war_player_1_card_down: 1,
  regular_player_2_card: 2,
  war_player_2_card_up: 2,
  war_player_2_card_down: 2,
};

function fail(kind: ValidationErrorKind, message: string): LineFailure {
  return { kind, message };
}

/** War state after a trick resolves with the given number of winners. */
function escalate(current: WarState, winnerCount: number): WarState {
  if (winnerCount > 1) {
    return current === "no_war" ? "war_start" : "war_ongoing";
  }
  return current === "war_ongoing" ? "war_end" : "no_war";
}

function winOutcome(player: PlayerId): GameEndOutcome {
  return player === 1 ? "player_1_win" : "player_2_win";
}

function formatPlayers(players: readonly PlayerId[]): string {
  return players.map((player) => `Player ${player}`).join(", ");
}

function formatCounts(counts: ReadonlyMap<PlayerId, number>): string {
  return Array.from(counts, ([player, count]) => `Player ${player}: ${count}`).join(", ");
}

/**
 * Validates a War transcript. Stateful and single-use: call `validate`
 * once on a freshly constructed instance.
 */
export class TranscriptValidator {
  private readonly classifier: LineClassifier;
  private readonly tracker: DeckConsistencyTracker;
  private readonly comparer = new TrickComparer(PLAYERS);
  private readonly machine = new ProtocolStateMachine();

  private round = 1;
  private warRound = 0;
  private warState: WarState = "no_war";
  private outcome: GameEndOutcome | null = null;
  private ended = false;
  private used = false;

  constructor(options: TranscriptValidatorOptions = {}) {
    const decks = options.decks ?? standardDeckSeeds();
    const seeded = decks.map((seed) => seed.player);
    if (seeded.length !== PLAYERS.length || !PLAYERS.every((p) => seeded.includes(p))) {
      throw new Error(`Deck seeds must cover exactly ${formatPlayers(PLAYERS)}`);
    }

    this.classifier = new LineClassifier(options.classifier);
    this.tracker = new DeckConsistencyTracker(decks);
  }

  get progress(): ValidationProgress {
    return {
      round: this.round,
      warRound: this.warRound,
      warState: this.warState,
      outcome: this.outcome,
      state: this.machine.state,
      remainingCounts: this.tracker.remainingCounts(),
      cardsInPlay: this.tracker.cardsInPlay(),
    };
  }

  /**
   * Validates the lines in order and returns the first error, if any.
   * @throws {ValidatorReuseError} on a second call.
   */
  validate(lines: readonly string[]): TranscriptVerdict {
    if (this.used) {
      throw new ValidatorReuseError();
    }
    this.used = true;

    for (const [index, text] of lines.entries()) {
      const failure = this.validateLine(text);
      if (failure) {
        return {
          valid: false,
          lastLineNumber: index + 1,
          finalState: this.machine.state,
          error: failure.message,
          errorKind: failure.kind,
        };
      }
    }

    if (!this.ended) {
      return {
        valid: false,
        lastLineNumber: lines.length,
        finalState: this.machine.state,
        error:
          `Game did not end; protocol state ${this.machine.state},` +
          ` war state ${this.warState},` +
          ` game end outcome ${this.outcome ?? "none"},` +
          ` and cards left ${formatCounts(this.tracker.remainingCounts())}`,
        errorKind: "incomplete",
      };
    }

    return {
      valid: true,
      lastLineNumber: lines.length,
      finalState: this.machine.state,
      error: null,
    };
  }

  // ── Per-line pipeline ─────────────────────────────────────────────

  private validateLine(text: string): LineFailure | null {
    const record = this.classifier.classify(text);

    if (record.kind === "malformed") {
      return fail("malformed_line", `Encountered malformed line: ${record.text}`);
    }

    // A line that cannot leave this state under any war state or outcome
    // is out of order, whatever the cards say. A war declared over a
    // trick that has a clear winner is judged on the cards instead.
    const declaresWar = record.kind === "commencing_war" || record.kind === "continuing_war";
    const judgedOnCards = declaresWar && this.machine.state === "round_winner";
    if (!judgedOnCards && !this.machine.expects(this.machine.state, record.kind)) {
      return this.unexpected(record);
    }

    const failure = this.checkRecord(record);
    if (failure) return failure;

    const transition = this.machine.advance(record, this.warState, this.outcome);
    if (transition.kind === "illegal") {
      return this.unexpected(record);
    }

    if (transition.nextState === "done") {
      this.ended = true;
    }
    return null;
  }

  private checkRecord(record: LineRecord): LineFailure | null {
    switch (record.kind) {
      case "round":
        if (record.round !== this.round) {
          return fail(
            "numbering",
            `Round number should be ${this.round}; found line with round number ${record.round}`
          );
        }
        this.deriveOutcome(ROUND_DRAWS);
        return null;

      case "war_round":
        if (record.round !== this.round) {
          return fail(
            "numbering",
            `Round number should be ${this.round}; found line with round number ${record.round}`
          );
        }
        if (record.warRound !== this.warRound) {
          return fail(
            "numbering",
            `War round number should be ${this.warRound}; found line with war round number ${record.warRound}`
          );
        }
        this.deriveOutcome(WAR_ROUND_DRAWS);
        return null;

      case "face_up_card":
      case "face_down_card":
        return this.playCard(record);

      case "round_winner":
        return this.settleRound(record);

      case "commencing_war":
      case "continuing_war":
        return this.declareWar(record.kind);

      case "game_winner":
      case "draw":
      case "player_label":
      case "empty":
        return null;

      case "malformed":
        return fail("malformed_line", `Encountered malformed line: ${record.text}`);
    }
  }

  // ── Semantic checks ───────────────────────────────────────────────

  private playCard(record: CardLine): LineFailure | null {
    const card: Card = { rank: record.rank, suit: record.suit };
    const player = PLAYER_TO_PLAY[this.machine.state];
    if (player === undefined) {
      return fail("ordering", `Cannot play ${formatCard(card)}; no card can be played yet`);
    }

    const played = this.tracker.playCard(card, player);
    if (!played.ok) {
      return fail("card_provenance", played.error);
    }

    if (record.kind === "face_up_card") {
      const shown = this.comparer.playFaceUp(card, player);
      if (!shown.ok) {
        return fail("card_provenance", shown.error);
      }
    }

    // A trick is complete on the last face-up card of a regular round,
    // or on the last face-down card of a war round.
    const completesTrick =
      (this.warState === "no_war" && record.kind === "face_up_card") ||
      (this.warState === "war_ongoing" && record.kind === "face_down_card");

    if (completesTrick) {
      const resolution = this.comparer.resolve();
      // Not every player has shown a card yet; the trick is still open.
      if (resolution.ok) {
        this.warState = escalate(this.warState, resolution.winners.length);
      }
    }

    return null;
  }

  private settleRound(record: RoundWinnerLine): LineFailure | null {
    const { winner, card: winningCard } = this.soleWinner();

    if (winner !== record.player) {
      return fail("trick_resolution", `Player ${winner} won; line says Player ${record.player}`);
    }

    const declared: Card = { rank: record.rank, suit: record.suit };
    if (!sameCard(winningCard, declared)) {
      return fail(
        "trick_resolution",
        `Player ${winner} won with ${formatCard(winningCard)};` +
          ` line says Player ${winner} won with ${formatCard(declared)}`
      );
    }

    const collected = this.tracker.collectTrick(winner);
    if (!collected.ok) {
      return fail("card_provenance", collected.error);
    }

    this.comparer.reset();
    this.warState = "no_war";
    this.round += 1;
    return null;
  }

  private declareWar(kind: "commencing_war" | "continuing_war"): LineFailure | null {
    const resolution = this.comparer.resolve();
    if (resolution.ok && resolution.winners.length === 1) {
      const verb = kind === "commencing_war" ? "commence" : "continue";
      return fail(
        "trick_resolution",
        `Single winner (${formatPlayers(resolution.winners)}), but line says war is to ${verb}`
      );
    }

    this.warRound = kind === "commencing_war" ? 1 : this.warRound + 1;
    this.warState = "war_ongoing";
    this.comparer.reset();
    return null;
  }

  /**
   * The winner of the current trick and their face-up card. The protocol
   * machine reaches round_winner only after a trick with one top card.
   */
  private soleWinner(): { readonly winner: PlayerId; readonly card: Card } {
    const resolution = this.comparer.resolve();
    const [winner, ...tied] = resolution.ok ? resolution.winners : [];
    const card = winner === undefined ? null : this.comparer.currentFaceUp(winner);
    if (winner === undefined || tied.length > 0 || card === null) {
      throw new Error(`No single trick winner in protocol state ${this.machine.state}`);
    }
    return { winner, card };
  }

  /**
   * Derives the game's end from the cards left before the next draws:
   * nobody able to play means a draw, exactly one player means a win.
   * Once derived, the outcome stands for the rest of the run.
   */
  private deriveOutcome(draws: number): void {
    if (this.outcome !== null) return;

    const contenders = Array.from(this.tracker.remainingCounts())
      .filter(([, count]) => count > draws)
      .map(([player]) => player);

    const [sole, ...others] = contenders;
    if (sole === undefined) {
      this.outcome = "draw";
    } else if (others.length === 0) {
      this.outcome = winOutcome(sole);
    }
  }

  private unexpected(record: LineRecord): LineFailure {
    return fail(
      "ordering",
      `Unexpected line "${renderLine(record)}" for protocol state ${this.machine.state}` +
        ` with war state ${this.warState},` +
        ` game end outcome ${this.outcome ?? "none"},` +
        ` and cards left ${formatCounts(this.tracker.remainingCounts())}`
    );
  }
}

/** Validates one transcript on a fresh validator. */
export function validateTranscript(
  lines: readonly string[],
  options: TranscriptValidatorOptions = {}
): TranscriptVerdict {
  return new TranscriptValidator(options).validate(lines);
}
