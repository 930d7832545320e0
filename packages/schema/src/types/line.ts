// ─── Line Records ──────────────────────────────────────────────────
// The closed set of records a transcript line can classify as.
// Discriminated on `kind`; every line maps to exactly one record.

import type { PlayerId, Rank, Suit } from "./card";

/** `Round <n>` */
export interface RoundLine {
  readonly kind: "round";
  readonly round: number;
}

/** `Player <p>:` */
export interface PlayerLabelLine {
  readonly kind: "player_label";
  readonly player: PlayerId;
}

/** `- <Rank> of <Suit>` */
export interface FaceUpCardLine {
  readonly kind: "face_up_card";
  readonly rank: Rank;
  readonly suit: Suit;
}

/** `- <Rank> of <Suit> (face down)` */
export interface FaceDownCardLine {
  readonly kind: "face_down_card";
  readonly rank: Rank;
  readonly suit: Suit;
}

/** `Round winner: Player <p> (<Rank> of <Suit>)` */
export interface RoundWinnerLine {
  readonly kind: "round_winner";
  readonly player: PlayerId;
  readonly rank: Rank;
  readonly suit: Suit;
}

/** `Commencing war...` */
export interface CommencingWarLine {
  readonly kind: "commencing_war";
}

/** `Round <n>, War <m>` */
export interface WarRoundLine {
  readonly kind: "war_round";
  readonly round: number;
  readonly warRound: number;
}

/** `Continuing war...` */
export interface ContinuingWarLine {
  readonly kind: "continuing_war";
}

/** `Player <p> wins with <n> cards in their deck` */
export interface GameWinnerLine {
  readonly kind: "game_winner";
  readonly player: PlayerId;
  readonly cardCount: number;
}

/** `The game ended in a draw` */
export interface DrawLine {
  readonly kind: "draw";
}

/** A line that is blank after trimming. Ignored by the protocol. */
export interface EmptyLine {
  readonly kind: "empty";
}

/** Anything else. Carries the line exactly as it was given. */
export interface MalformedLine {
  readonly kind: "malformed";
  readonly text: string;
}

export type LineRecord =
  | RoundLine
  | PlayerLabelLine
  | FaceUpCardLine
  | FaceDownCardLine
  | RoundWinnerLine
  | CommencingWarLine
  | WarRoundLine
  | ContinuingWarLine
  | GameWinnerLine
  | DrawLine
  | EmptyLine
  | MalformedLine;

export type LineKind = LineRecord["kind"];

/** Records that place a card on the table. */
export type CardLine = FaceUpCardLine | FaceDownCardLine;
