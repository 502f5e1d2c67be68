import {
  cardsEqual,
  compareRanks,
  RANK_ORDER,
  RANKS,
  sortByRankDesc,
  type Card,
  type Suit,
} from './card.js';
import { InsufficientCardsError } from './errors.js';
import { formatCardGroups, formatCards } from './format.js';
import { silentLogger, type HandLogger } from './logger.js';

// 0 = high card ... 8 = straight flush
export type HandRank = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export const HAND_RANK = {
  HIGH_CARD: 0,
  ONE_PAIR: 1,
  TWO_PAIR: 2,
  THREE_OF_A_KIND: 3,
  STRAIGHT: 4,
  FLUSH: 5,
  FULL_HOUSE: 6,
  FOUR_OF_A_KIND: 7,
  STRAIGHT_FLUSH: 8,
} as const satisfies Record<string, HandRank>;

export const HAND_RANK_NAMES: Record<HandRank, string> = {
  0: 'High Card',
  1: 'One Pair',
  2: 'Two Pair',
  3: 'Three of a Kind',
  4: 'Straight',
  5: 'Flush',
  6: 'Full House',
  7: 'Four of a Kind',
  8: 'Straight Flush',
};

export const HAND_SIZE = 5;

export interface HandEvaluation {
  handRank: HandRank;
  /** Cards that make up the category, e.g. the two cards of a pair. */
  handCards: Card[];
  /** Highest remaining cards, filling the hand up to five. */
  kickers: Card[];
}

export function handRankName(rank: HandRank): string {
  return HAND_RANK_NAMES[rank];
}

/**
 * Group cards of the same rank. Buckets come out highest rank first and keep
 * the order the cards were given in.
 */
export function groupByRank(cards: readonly Card[]): Card[][] {
  const buckets = Array.from({ length: RANK_ORDER.A + 1 }, (): Card[] => []);
  for (const card of cards) {
    buckets[RANK_ORDER[card.rank]].push(card);
  }
  return RANKS.map((rank) => buckets[RANK_ORDER[rank]]).filter((bucket) => bucket.length > 0);
}

/**
 * Group cards of the same suit, suits ordered by first appearance.
 */
export function groupBySuit(cards: readonly Card[]): Card[][] {
  const buckets = new Map<Suit, Card[]>();
  for (const card of cards) {
    const bucket = buckets.get(card.suit);
    if (bucket) {
      bucket.push(card);
    } else {
      buckets.set(card.suit, [card]);
    }
  }
  return Array.from(buckets.values());
}

/**
 * Every five-card flush in rank-sorted cards: each run of five consecutive
 * cards within a suit holding five or more.
 */
export function findFlushes(cards: readonly Card[]): Card[][] {
  const flushes: Card[][] = [];
  for (const suited of groupBySuit(cards)) {
    for (let i = 0; i + HAND_SIZE <= suited.length; i++) {
      flushes.push(suited.slice(i, i + HAND_SIZE));
    }
  }
  return flushes;
}

/**
 * Straights in rank-sorted cards, highest first.
 *
 * A window of five neighbouring cards is a straight when its ranks match five
 * consecutive entries of RANKS. A duplicate rank inside the window breaks it,
 * and the ace only counts high (no A-2-3-4-5).
 */
export function findStraights(cards: readonly Card[]): Card[][] {
  const straights: Card[][] = [];
  for (let i = 0; i + HAND_SIZE <= cards.length; i++) {
    const window = cards.slice(i, i + HAND_SIZE);
    const start = RANKS.indexOf(window[0].rank);
    const expected = RANKS.slice(start, start + HAND_SIZE);
    if (expected.length === HAND_SIZE && window.every((card, k) => card.rank === expected[k])) {
      straights.push(window);
    }
  }
  return straights;
}

function sameCards(a: readonly Card[], b: readonly Card[]): boolean {
  return a.length === b.length && a.every((card, i) => cardsEqual(card, b[i]));
}

/**
 * Highest cards not used by the category, at most enough to make five.
 * Each hand card removes one matching card.
 */
export function pickKickers(cards: readonly Card[], handCards: readonly Card[]): Card[] {
  const kickerCount = HAND_SIZE - handCards.length;
  if (kickerCount <= 0) {
    return [];
  }
  const rest = [...cards];
  for (const card of handCards) {
    const index = rest.findIndex((c) => cardsEqual(c, card));
    if (index !== -1) {
      rest.splice(index, 1);
    }
  }
  return rest.slice(0, kickerCount);
}

function resolveCategory(
  cards: readonly Card[],
  logger: HandLogger
): { handRank: HandRank; handCards: Card[] } {
  const straights = findStraights(cards);
  if (straights.length > 0) {
    logger.debug({ straights: formatCardGroups(straights) }, 'straights found');
  }
  const flushes = findFlushes(cards);
  if (flushes.length > 0) {
    logger.debug({ flushes: formatCardGroups(flushes) }, 'flushes found');
  }

  const pairs: Card[][] = [];
  const threes: Card[][] = [];
  const fours: Card[][] = [];
  for (const bucket of groupByRank(cards)) {
    if (bucket.length >= 4) {
      fours.push(bucket.slice(0, 4));
    } else if (bucket.length === 3) {
      threes.push(bucket);
    } else if (bucket.length === 2) {
      pairs.push(bucket);
    }
  }
  if (pairs.length + threes.length + fours.length > 0) {
    logger.debug(
      {
        pairs: formatCardGroups(pairs),
        threes: formatCardGroups(threes),
        fours: formatCardGroups(fours),
      },
      'rank groups found'
    );
  }

  const straightFlush = straights.find((straight) =>
    flushes.some((flush) => sameCards(straight, flush))
  );
  if (straightFlush) {
    return { handRank: HAND_RANK.STRAIGHT_FLUSH, handCards: straightFlush };
  }
  if (fours.length > 0) {
    return { handRank: HAND_RANK.FOUR_OF_A_KIND, handCards: fours[0] };
  }
  if (threes.length > 1) {
    return {
      handRank: HAND_RANK.FULL_HOUSE,
      handCards: [...threes[0], ...threes[1].slice(0, 2)],
    };
  }
  if (threes.length === 1 && pairs.length > 0) {
    return { handRank: HAND_RANK.FULL_HOUSE, handCards: [...threes[0], ...pairs[0]] };
  }
  if (flushes.length > 0) {
    return { handRank: HAND_RANK.FLUSH, handCards: flushes[0] };
  }
  if (straights.length > 0) {
    return { handRank: HAND_RANK.STRAIGHT, handCards: straights[0] };
  }
  if (threes.length > 0) {
    return { handRank: HAND_RANK.THREE_OF_A_KIND, handCards: threes[0] };
  }
  if (pairs.length > 1) {
    return { handRank: HAND_RANK.TWO_PAIR, handCards: [...pairs[0], ...pairs[1]] };
  }
  if (pairs.length === 1) {
    return { handRank: HAND_RANK.ONE_PAIR, handCards: pairs[0] };
  }
  return { handRank: HAND_RANK.HIGH_CARD, handCards: [cards[0]] };
}

/**
 * Find the best five-card poker hand among five or more cards.
 * The input is not modified.
 */
export function evaluateCards(
  cards: readonly Card[],
  logger: HandLogger = silentLogger
): HandEvaluation {
  if (cards.length < HAND_SIZE) {
    throw new InsufficientCardsError(cards.length);
  }
  const sorted = sortByRankDesc(cards);
  logger.debug({ cards: formatCards(sorted) }, 'evaluating hand');

  const { handRank, handCards } = resolveCategory(sorted, logger);
  const kickers = pickKickers(sorted, handCards);
  logger.debug(
    {
      handRank,
      handName: handRankName(handRank),
      handCards: formatCards(handCards),
      kickers: formatCards(kickers),
    },
    'hand evaluated'
  );
  return { handRank, handCards, kickers };
}

function compareCardLists(a: readonly Card[], b: readonly Card[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = compareRanks(a[i], b[i]);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

/**
 * Compare two evaluated hands.
 * Hand rank first, then the category cards pairwise, then the kickers.
 * Suits never matter.
 * Returns: -1 if a is weaker, +1 if a is stronger, 0 on a tie
 */
export function compareEvaluations(a: HandEvaluation, b: HandEvaluation): number {
  if (a.handRank !== b.handRank) {
    return a.handRank < b.handRank ? -1 : 1;
  }
  return compareCardLists(a.handCards, b.handCards) || compareCardLists(a.kickers, b.kickers);
}
