// ─── Standard Deck ─────────────────────────────────────────────────
// Card helpers over the 52-card universe: construction, comparison by
// rank, and the text form used in transcripts.

import { RANKS, SUITS } from "@war-audit/schema";
import type { Card, Rank, Suit } from "../types/index";

/**
 * Standard 52-card deck: 13 ranks × 4 suits, rank-major.
 * Each call returns new card objects.
 */
export function standardDeck(): readonly Card[] {
  const cards: Card[] = [];
  for (const rank of RANKS) {
    for (const suit of SUITS) {
      cards.push({ rank, suit });
    }
  }
  return cards;
}

/** Position of the rank in ascending order (Ace = 0, King = 12). */
export function rankValue(rank: Rank): number {
  return RANKS.indexOf(rank);
}

/**
 * Stable string key for a card. Cards are plain objects, so sets and
 * maps of cards are keyed by this instead of by identity.
 */
export function cardKey(card: Card): string {
  return `${card.rank} of ${card.suit}`;
}

/** Transcript spelling of a card: "Queen of Hearts". */
export function formatCard(card: Card): string {
  return cardKey(card);
}

export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

export function isRank(token: string): token is Rank {
  return RANKS.some((rank) => rank === token);
}

export function isSuit(token: string): token is Suit {
  return SUITS.some((suit) => suit === token);
}
