import { createCard, formatCard, cardsEqual, RANKS, SUITS, type Card } from './card.js';
import { CardNotRemovedError, EmptyDeckError, InvalidPositionError } from './errors.js';

// Throughout this module top/bottom refers to a deck lying face down.
export type DeckPosition = 'top' | 'bottom';

export function isDeckPosition(value: unknown): value is DeckPosition {
  return value === 'top' || value === 'bottom';
}

export interface DeckStats {
  active: number;
  popped: number;
  discarded: number;
}

export interface DeckOptions {
  /** Returns a float in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

/**
 * Create a fresh 52-card deck (all suits * all ranks), suit by suit.
 */
export function createDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Fisher-Yates shuffle algorithm
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * mulberry32: small seeded PRNG for reproducible shuffles.
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function removeCard(pile: Card[], card: Card): boolean {
  const index = pile.findIndex((c) => cardsEqual(c, card));
  if (index === -1) {
    return false;
  }
  pile.splice(index, 1);
  return true;
}

/**
 * A single deck of 52 cards split into three piles: active (still in the
 * deck), popped (dealt) and discarded (burned). Every pile is ordered from
 * the bottom up, so the top card of the deck is the last active card.
 */
export class Deck {
  private readonly activePile: Card[] = createDeck();
  private readonly poppedPile: Card[] = [];
  private readonly discardedPile: Card[] = [];
  private readonly random: () => number;

  constructor(options: DeckOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  get active(): readonly Card[] {
    return this.activePile;
  }

  get popped(): readonly Card[] {
    return this.poppedPile;
  }

  get discarded(): readonly Card[] {
    return this.discardedPile;
  }

  /** Shuffle the active cards. Popped and discarded cards stay put. */
  shuffle(): void {
    const shuffled = shuffle(this.activePile, this.random);
    this.activePile.splice(0, this.activePile.length, ...shuffled);
  }

  /** Deal the top card. */
  deal(): Card {
    const card = this.takeTop();
    this.poppedPile.push(card);
    return card;
  }

  /** Discard the top card without showing it. */
  burn(): void {
    this.discardedPile.push(this.takeTop());
  }

  /**
   * Put popped or discarded cards back into the deck.
   *
   * Cards are moved one at a time. When a card turns out not to be out of the
   * deck a CardNotRemovedError is thrown, and the cards before it in the
   * batch stay returned. With 'bottom' each card goes under the current
   * bottom card in turn, so the last card given ends up lowest.
   */
  returnCards(cards: readonly Card[], position: DeckPosition = 'bottom'): void {
    if (!isDeckPosition(position)) {
      throw new InvalidPositionError(String(position));
    }
    // Snapshot: callers may pass this.popped or this.discarded itself.
    for (const card of [...cards]) {
      if (!removeCard(this.discardedPile, card) && !removeCard(this.poppedPile, card)) {
        throw new CardNotRemovedError(formatCard(card));
      }
      if (position === 'bottom') {
        this.activePile.unshift(card);
      } else {
        this.activePile.push(card);
      }
    }
  }

  returnDiscarded(position: DeckPosition = 'bottom'): void {
    this.returnCards(this.discardedPile, position);
  }

  returnPopped(position: DeckPosition = 'bottom'): void {
    this.returnCards(this.poppedPile, position);
  }

  /**
   * Return popped, then discarded cards.
   * Both always go to the bottom; `position` is accepted but not used.
   */
  returnAll(position: DeckPosition = 'bottom'): void {
    this.returnPopped();
    this.returnDiscarded();
  }

  stats(): DeckStats {
    return {
      active: this.activePile.length,
      popped: this.poppedPile.length,
      discarded: this.discardedPile.length,
    };
  }

  toString(): string {
    return `[${this.activePile.map(formatCard).join(' ')}]`;
  }

  private takeTop(): Card {
    const card = this.activePile.pop();
    if (!card) {
      throw new EmptyDeckError();
    }
    return card;
  }
}
