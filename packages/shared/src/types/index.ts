// Re-export all types from the canonical schema package.
export type { Card, PlayerId, Rank, Suit } from "@war-audit/schema";
export type { CardLine, CommencingWarLine, ContinuingWarLine, DrawLine, EmptyLine, FaceDownCardLine, FaceUpCardLine, GameWinnerLine, LineKind, LineRecord, MalformedLine, PlayerLabelLine, RoundLine, RoundWinnerLine, WarRoundLine } from "@war-audit/schema";
export type { GameEndOutcome, ProtocolState, TranscriptVerdict, ValidationErrorKind, ValidatorConfig, WarState } from "@war-audit/schema";
