// ─── Verdicts ──────────────────────────────────────────────────────
// The result of validating one transcript.

import type { ProtocolState } from "./protocol";

/** Why a transcript was rejected. */
export type ValidationErrorKind =
  /** A line matches no grammar rule. */
  | "malformed_line"
  /** A well-formed line appears where the protocol does not allow it. */
  | "ordering"
  /** A round or war-round header carries the wrong number. */
  | "numbering"
  /** A card is played from the wrong deck, twice, or before it is reachable. */
  | "card_provenance"
  /** A declared winner, winning card or war does not follow from the cards. */
  | "trick_resolution"
  /** The transcript stops before a game winner or draw line. */
  | "incomplete";

/** Discriminated on `valid`. `error` is null exactly when the transcript is valid. */
export type TranscriptVerdict =
  | {
      readonly valid: true;
      readonly lastLineNumber: number;
      readonly finalState: ProtocolState;
      readonly error: null;
    }
  | {
      readonly valid: false;
      /** 1-based number of the failing line, or of the last line for `incomplete`. */
      readonly lastLineNumber: number;
      readonly finalState: ProtocolState;
      readonly error: string;
      readonly errorKind: ValidationErrorKind;
    };
