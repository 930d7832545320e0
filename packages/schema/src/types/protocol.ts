// ─── Protocol States ───────────────────────────────────────────────
// What the validator expects to read next. A round walks the regular
// pipeline; a tie on rank detours through the war pipeline; once the
// game's end is derivable only the closing lines are accepted.

export type ProtocolState =
  // Regular round
  | "regular_round"
  | "regular_player_1_label"
  | "regular_player_1_card"
  | "regular_player_2_label"
  | "regular_player_2_card"
  | "round_winner"
  // War
  | "commencing_war"
  | "war_round"
  | "war_player_1_label"
  | "war_player_1_card_up"
  | "war_player_1_card_down"
  | "war_player_2_label"
  | "war_player_2_card_up"
  | "war_player_2_card_down"
  | "continuing_war"
  // Closing
  | "winner_player_1"
  | "winner_player_2"
  | "draw"
  | "done";

/**
 * Where the current trick stands with respect to a war. Derived from
 * trick resolutions, never read from the transcript.
 */
export type WarState = "no_war" | "war_start" | "war_ongoing" | "war_end";

/**
 * How the game must end given the cards left. `null` wherever used means
 * the end cannot be derived yet.
 */
export type GameEndOutcome = "player_1_win" | "player_2_win" | "draw";
