// ─── Trick Comparer ────────────────────────────────────────────────
// Holds the face-up cards of the current trick and decides who takes
// it. Only rank counts; equal top ranks mean war, not an error.

import type { Card, PlayerId } from "../types/index.js";
import { formatCard, rankValue } from "../deck/index.js";

/** Result of resolving a trick. Discriminated union. */
export type TrickResolution =
  | { readonly ok: true; readonly winners: readonly PlayerId[] }
  | { readonly ok: false; readonly error: string };

export type FaceUpResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

export class TrickComparer {
  private readonly faceUp = new Map<PlayerId, Card>();

  /** @param players - Players expected in every trick, in table order. */
  constructor(private readonly players: readonly PlayerId[] = [1, 2]) {}

  playFaceUp(card: Card, player: PlayerId): FaceUpResult {
    const pending = this.faceUp.get(player);
    if (pending) {
      return {
        ok: false,
        error:
          `Player ${player} tried to play face up card ${formatCard(card)},` +
          ` but already has face up card ${formatCard(pending)} in play`,
      };
    }

    this.faceUp.set(player, card);
    return { ok: true };
  }

  currentFaceUp(player: PlayerId): Card | null {
    return this.faceUp.get(player) ?? null;
  }

  /**
   * Returns every player holding the highest rank, in table order.
   * More than one winner means the trick is tied.
   */
  resolve(): TrickResolution {
    let best = -1;
    let winners: PlayerId[] = [];

    for (const player of this.players) {
      const card = this.faceUp.get(player);
      if (!card) {
        return { ok: false, error: `Player ${player} still has no face up card` };
      }

      const value = rankValue(card.rank);
      if (value > best) {
        best = value;
        winners = [player];
      } else if (value === best) {
        winners.push(player);
      }
    }

    return { ok: true, winners };
  }

  reset(): void {
    this.faceUp.clear();
  }
}
