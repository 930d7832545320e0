// ─── Deck Consistency Tracker ──────────────────────────────────────
// Tracks which cards each player can still draw when the deal itself
// is unknown. A deck is an ordered queue of unordered card groups: the
// initial candidates first, then each collected trick as its own group.
// A card is drawable only from the front group.

import type { Card, PlayerId } from "../types/index.js";
import { cardKey, formatCard, standardDeck } from "../deck/index.js";

/** Outcome of a tracker operation. Discriminated union. */
export type TrackerResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

/** Starting position of one player's deck. */
export interface DeckSeed {
  readonly player: PlayerId;
  /** Number of cards the player actually holds. */
  readonly count: number;
  /** Cards the player could be holding; forms the first group. */
  readonly cards: readonly Card[];
}

/** Players 1 and 2, 26 cards each, either of whom may hold any standard card. */
export function standardDeckSeeds(): readonly DeckSeed[] {
  return [
    { player: 1, count: 26, cards: standardDeck() },
    { player: 2, count: 26, cards: standardDeck() },
  ];
}

const OK: TrackerResult = { ok: true };

/**
 * An ordered sequence of unordered card groups. Groups are appended at
 * the back and drained from the front.
 */
export class CardGroupDeck {
  private readonly groups: Map<string, Card>[] = [];

  constructor(initial: readonly Card[] = []) {
    this.addGroupToBottom(initial);
  }

  /** Total number of candidate cards across all groups. */
  get size(): number {
    return this.groups.reduce((sum, group) => sum + group.size, 0);
  }

  get groupCount(): number {
    return this.groups.length;
  }

  /** Whether the card is in the front group. */
  canDraw(card: Card): boolean {
    return this.groups[0]?.has(cardKey(card)) ?? false;
  }

  /** Removes the card from whichever group holds it, dropping the group if it empties. */
  removeIfPresent(card: Card): void {
    const key = cardKey(card);
    for (const [index, group] of this.groups.entries()) {
      if (!group.delete(key)) continue;
      if (group.size === 0) {
        this.groups.splice(index, 1);
      }
      return;
    }
  }

  /** Appends the cards as one group. An empty group is never added. */
  addGroupToBottom(cards: readonly Card[]): void {
    if (cards.length === 0) return;
    this.groups.push(new Map(cards.map((card) => [cardKey(card), card])));
  }

  /** Snapshot of the groups, front first. */
  toGroups(): readonly (readonly Card[])[] {
    return this.groups.map((group) => Array.from(group.values()));
  }
}

/**
 * Enforces card provenance across both players: no card is played twice
 * without being won back, no card is played from another player's deck,
 * and no card is played before the groups ahead of it are exhausted.
 */
export class DeckConsistencyTracker {
  private readonly owners = new Map<string, PlayerId>();
  private readonly inPlay = new Map<string, Card>();
  private readonly decks = new Map<PlayerId, CardGroupDeck>();
  private readonly counts = new Map<PlayerId, number>();

  constructor(seeds: readonly DeckSeed[] = standardDeckSeeds()) {
    for (const seed of seeds) {
      if (this.decks.has(seed.player)) {
        throw new Error(`Duplicate deck seed for Player ${seed.player}`);
      }
      this.decks.set(seed.player, new CardGroupDeck(seed.cards));
      this.counts.set(seed.player, seed.count);
    }
  }

  /** Cards each player actually holds, in seed order. */
  remainingCounts(): ReadonlyMap<PlayerId, number> {
    return new Map(this.counts);
  }

  /** Cards on the table awaiting collection. */
  cardsInPlay(): readonly Card[] {
    return Array.from(this.inPlay.values());
  }

  /** The candidate groups of a player's deck, front first. */
  deckGroups(player: PlayerId): readonly (readonly Card[])[] {
    return this.deckOf(player).toGroups();
  }

  playCard(card: Card, player: PlayerId): TrackerResult {
    const deck = this.deckOf(player);
    const key = cardKey(card);
    const label = formatCard(card);

    const owner = this.owners.get(key);
    if (owner !== undefined && owner !== player) {
      return { ok: false, error: `${label} is not in deck of Player ${player}` };
    }

    if (!deck.canDraw(card)) {
      return {
        ok: false,
        error: `${label} is not in topmost card group of deck of Player ${player}`,
      };
    }

    if (this.inPlay.has(key)) {
      return { ok: false, error: `${label} is already in play` };
    }

    this.owners.delete(key);
    this.inPlay.set(key, card);
    this.counts.set(player, (this.counts.get(player) ?? 0) - 1);
    for (const candidateDeck of this.decks.values()) {
      candidateDeck.removeIfPresent(card);
    }

    return OK;
  }

  /** Moves every card in play to the bottom of the player's deck as one group. */
  collectTrick(player: PlayerId): TrackerResult {
    const deck = this.deckOf(player);
    const cards = this.cardsInPlay();

    for (const card of cards) {
      const key = cardKey(card);
      if (this.owners.has(key)) {
        return {
          ok: false,
          error: `${formatCard(card)} to be taken by Player ${player} is not in play`,
        };
      }
    }

    deck.addGroupToBottom(cards);
    for (const card of cards) {
      this.owners.set(cardKey(card), player);
    }
    this.counts.set(player, (this.counts.get(player) ?? 0) + cards.length);
    this.inPlay.clear();

    return OK;
  }

  private deckOf(player: PlayerId): CardGroupDeck {
    const deck = this.decks.get(player);
    if (!deck) {
      throw new Error(`Unknown player: ${player}`);
    }
    return deck;
  }
}
