import { DuplicateCardError, InvalidRankError, InvalidSuitError } from './errors.js';

export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 'A' | 'K' | 'Q' | 'J' | 'T' | '9' | '8' | '7' | '6' | '5' | '4' | '3' | '2';

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

// Highest first. Straight detection slices this list, so it must not wrap.
export const RANKS = ['A', 'K', 'Q', 'J', 'T', '9', '8', '7', '6', '5', '4', '3', '2'] as const satisfies readonly Rank[];

export const SUITS = ['S', 'H', 'D', 'C'] as const satisfies readonly Suit[];

// Rank order: 2 3 4 5 6 7 8 9 T J Q K A
export const RANK_ORDER: Record<Rank, number> = {
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  T: 10,
  J: 11,
  Q: 12,
  K: 13,
  A: 14,
};

export const SUIT_NAMES: Record<Suit, string> = {
  S: 'spade',
  H: 'heart',
  D: 'diamond',
  C: 'club',
};

export function isRank(value: string): value is Rank {
  return RANKS.some((rank) => rank === value);
}

export function isSuit(value: string): value is Suit {
  return SUITS.some((suit) => suit === value);
}

/**
 * Create a card from its rank and suit.
 * Accepts plain strings so that unchecked input can be validated here.
 */
export function createCard(rank: string, suit: string): Card {
  if (!isRank(rank)) {
    throw new InvalidRankError(rank);
  }
  if (!isSuit(suit)) {
    throw new InvalidSuitError(suit);
  }
  return Object.freeze({ rank, suit });
}

/**
 * Parse a two-character card code, rank first: 'AS', 'TH', '2C'.
 */
export function parseCard(code: string): Card {
  if (code.length !== 2) {
    const rank = code.charAt(0);
    if (!isRank(rank)) {
      throw new InvalidRankError(rank);
    }
    throw new InvalidSuitError(code.slice(1));
  }
  return createCard(code[0], code[1]);
}

/**
 * Create one card for each code given.
 */
export function cardList(...codes: string[]): Card[] {
  return codes.map((code) => parseCard(code));
}

export function formatCard(card: Card): string {
  return card.rank + card.suit;
}

/**
 * Identity key of a card. Distinct for every (rank, suit) pair,
 * unlike the relational helpers below which only look at the rank.
 */
export function cardKey(card: Card): number {
  return (card.rank.charCodeAt(0) << 8) + card.suit.charCodeAt(0);
}

/** Throws DuplicateCardError on the first card seen twice. */
export function assertDistinctCards(cards: readonly Card[]): void {
  const seen = new Set<number>();
  for (const card of cards) {
    const key = cardKey(card);
    if (seen.has(key)) {
      throw new DuplicateCardError(formatCard(card));
    }
    seen.add(key);
  }
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/**
 * Compare two cards by rank only.
 * Returns: negative if a ranks lower, positive if higher, 0 on the same rank
 * (even when the suits differ).
 */
export function compareRanks(a: Card, b: Card): number {
  return RANK_ORDER[a.rank] - RANK_ORDER[b.rank];
}

export function isHigher(a: Card, b: Card): boolean {
  return compareRanks(a, b) > 0;
}

export function isLower(a: Card, b: Card): boolean {
  return compareRanks(a, b) < 0;
}

// 'KS' and 'KH' are both at least and at most each other, yet not equal.
export function isAtLeast(a: Card, b: Card): boolean {
  return compareRanks(a, b) >= 0;
}

export function isAtMost(a: Card, b: Card): boolean {
  return compareRanks(a, b) <= 0;
}

/**
 * Sort cards highest rank first. Cards of the same rank keep their
 * relative order. Returns a new array.
 */
export function sortByRankDesc(cards: readonly Card[]): Card[] {
  return [...cards].sort((a, b) => compareRanks(b, a));
}
