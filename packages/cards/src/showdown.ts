import { assertDistinctCards, type Card } from './card.js';
import { compareHands, PokerHand } from './hand.js';
import type { HandLogger } from './logger.js';

export interface ShowdownSeat {
  id: string;
  hole: readonly Card[];
}

export interface RankedSeat {
  id: string;
  hand: PokerHand;
}

export interface ShowdownResult {
  /** Strongest first. Tied seats keep their seat order. */
  ranked: RankedSeat[];
  /** Every seat tied with the strongest hand. */
  winners: string[];
}

/**
 * Evaluate each seat's hole cards together with the shared board and
 * order the seats by hand strength.
 */
export function showdown(
  seats: readonly ShowdownSeat[],
  board: readonly Card[],
  options: { logger?: HandLogger } = {}
): ShowdownResult {
  assertDistinctCards([...board, ...seats.flatMap((seat) => seat.hole)]);

  const ranked = seats
    .map((seat) => ({
      id: seat.id,
      hand: new PokerHand([...seat.hole, ...board], { logger: options.logger }),
    }))
    .sort((a, b) => compareHands(b.hand, a.hand));

  const best = ranked[0];
  const winners = best
    ? ranked.filter((seat) => compareHands(seat.hand, best.hand) === 0).map((seat) => seat.id)
    : [];
  return { ranked, winners };
}
