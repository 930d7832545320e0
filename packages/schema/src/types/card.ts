// ─── Card Primitives ───────────────────────────────────────────────
// Ranks, suits and cards of the standard 52-card deck, spelled exactly
// as they appear in a transcript.

/** Ranks in ascending order. Ace is low; there is no high-Ace rule. */
export const RANKS = [
  "Ace",
  "Two",
  "Three",
  "Four",
  "Five",
  "Six",
  "Seven",
  "Eight",
  "Nine",
  "Ten",
  "Jack",
  "Queen",
  "King",
] as const;

/** Suits carry no order; they only distinguish cards of equal rank. */
export const SUITS = ["Clubs", "Diamonds", "Hearts", "Spades"] as const;

export type Rank = (typeof RANKS)[number];

export type Suit = (typeof SUITS)[number];

/** A card of the standard deck. Two cards are equal when rank and suit match. */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

/** Player numbers as written in a transcript ("Player 1:"). */
export type PlayerId = number;
