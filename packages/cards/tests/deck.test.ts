import { describe, expect, it } from 'vitest';
import {
  CardNotRemovedError,
  cardKey,
  createSeededRandom,
  Deck,
  EmptyDeckError,
  formatCard,
  formatCards,
  InvalidPositionError,
  isDeckPosition,
  parseCard,
  type Card,
  type DeckPosition,
} from '../src/index.js';

const codes = (cards: readonly Card[]): string[] => cards.map(formatCard);
const sortedKeys = (cards: readonly Card[]): number[] => cards.map(cardKey).sort((a, b) => a - b);

describe('deck', () => {
  it('starts with all 52 cards active, suit by suit', () => {
    const deck = new Deck();
    expect(deck.stats()).toEqual({ active: 52, popped: 0, discarded: 0 });
    expect(formatCard(deck.active[0])).toBe('AS');
    expect(formatCard(deck.active[12])).toBe('2S');
    expect(formatCard(deck.active[13])).toBe('AH');
    expect(formatCard(deck.active[51])).toBe('2C');
    expect(deck.toString().startsWith('[AS KS QS ')).toBe(true);
  });

  it('deals from the top', () => {
    const deck = new Deck();
    expect(formatCard(deck.deal())).toBe('2C');
    expect(formatCard(deck.deal())).toBe('3C');
    expect(codes(deck.popped)).toEqual(['2C', '3C']);
    expect(deck.stats()).toEqual({ active: 50, popped: 2, discarded: 0 });
  });

  it('pops and returns cards to the top', () => {
    const deck = new Deck({ random: createSeededRandom(42) });
    deck.shuffle();
    const stack = [deck.deal(), deck.deal(), deck.deal()];
    expect(deck.popped).toEqual(stack);
    expect(deck.active).toHaveLength(49);

    deck.returnPopped('top');
    expect(deck.popped).toHaveLength(0);
    expect(deck.active).toHaveLength(52);
    expect(deck.active.slice(-3)).toEqual(stack);
  });

  it('discards and returns cards to the top', () => {
    const deck = new Deck({ random: createSeededRandom(3) });
    deck.shuffle();
    const stack: Card[] = [];
    for (let i = 0; i < 3; i++) {
      stack.push(deck.active[deck.active.length - 1]);
      deck.burn();
    }
    expect(deck.discarded).toEqual(stack);
    expect(deck.active).toHaveLength(49);

    deck.returnDiscarded('top');
    expect(deck.discarded).toHaveLength(0);
    expect(deck.active.slice(-3)).toEqual(stack);
  });

  it('slides each returned card under the bottom in turn', () => {
    const deck = new Deck();
    deck.deal();
    deck.deal();
    deck.returnPopped();
    expect(codes(deck.active.slice(0, 3))).toEqual(['3C', '2C', 'AS']);
    expect(formatCard(deck.active[51])).toBe('4C');
  });

  it('returns cards equal by value', () => {
    const deck = new Deck();
    deck.deal();
    deck.returnCards([parseCard('2C')], 'top');
    expect(deck.stats()).toEqual({ active: 52, popped: 0, discarded: 0 });
    expect(formatCard(deck.active[51])).toBe('2C');
  });

  it('refuses to return a card that is still in the deck', () => {
    const deck = new Deck();
    expect(() => deck.returnCards([parseCard('AS')])).toThrow(CardNotRemovedError);
  });

  it('keeps the cards moved before a failing one', () => {
    const deck = new Deck();
    deck.deal();
    deck.deal();
    expect(() => deck.returnCards([parseCard('2C'), parseCard('AS')])).toThrow(CardNotRemovedError);
    expect(deck.stats()).toEqual({ active: 51, popped: 1, discarded: 0 });
    expect(codes(deck.popped)).toEqual(['3C']);
  });

  it('rejects an unknown position before moving anything', () => {
    const deck = new Deck();
    deck.deal();
    // Positions arriving from untyped JSON.
    const position: DeckPosition = JSON.parse('"middle"');
    expect(isDeckPosition(position)).toBe(false);
    expect(() => deck.returnCards([parseCard('2C')], position)).toThrow(InvalidPositionError);
    expect(deck.stats()).toEqual({ active: 51, popped: 1, discarded: 0 });
    expect(codes(deck.popped)).toEqual(['2C']);
  });

  it('returns everything to the bottom whatever position is asked for', () => {
    const deck = new Deck();
    deck.deal();
    deck.burn();
    deck.returnAll('top');
    expect(deck.stats()).toEqual({ active: 52, popped: 0, discarded: 0 });
    expect(codes(deck.active.slice(0, 2))).toEqual(['3C', '2C']);
    expect(formatCard(deck.active[51])).toBe('4C');
  });

  it('throws when dealing or burning from an empty deck', () => {
    const deck = new Deck();
    for (let i = 0; i < 52; i++) {
      deck.deal();
    }
    expect(() => deck.deal()).toThrow(EmptyDeckError);
    expect(() => deck.burn()).toThrow(EmptyDeckError);
    expect(deck.stats()).toEqual({ active: 0, popped: 52, discarded: 0 });
  });

  it('shuffles only the active cards', () => {
    const deck = new Deck({ random: createSeededRandom(11) });
    deck.deal();
    deck.burn();
    const before = sortedKeys(deck.active);
    deck.shuffle();
    expect(sortedKeys(deck.active)).toEqual(before);
    expect(codes(deck.popped)).toEqual(['2C']);
    expect(codes(deck.discarded)).toEqual(['3C']);
  });

  it('shuffles the same way for the same seed', () => {
    const a = new Deck({ random: createSeededRandom(2024) });
    const b = new Deck({ random: createSeededRandom(2024) });
    a.shuffle();
    b.shuffle();
    expect(formatCards(a.active)).toBe(formatCards(b.active));
  });

  it('always accounts for all 52 cards', () => {
    const random = createSeededRandom(99);
    const deck = new Deck({ random });
    for (let step = 0; step < 200; step++) {
      const roll = Math.floor(random() * 6);
      if (roll === 0) {
        deck.shuffle();
      } else if (roll === 1 && deck.active.length > 0) {
        deck.deal();
      } else if (roll === 2 && deck.active.length > 0) {
        deck.burn();
      } else if (roll === 3) {
        deck.returnPopped(random() < 0.5 ? 'top' : 'bottom');
      } else if (roll === 4) {
        deck.returnDiscarded('top');
      } else if (roll === 5 && deck.popped.length > 0) {
        deck.returnCards([deck.popped[0]]);
      }
      const { active, popped, discarded } = deck.stats();
      expect(active + popped + discarded).toBe(52);
    }
    const all = [...deck.active, ...deck.popped, ...deck.discarded];
    expect(new Set(all.map(cardKey)).size).toBe(52);
  });

  it('keeps the seeded sequence exact over long runs', () => {
    const steps = 5_000_000;
    const long = createSeededRandom(1);
    for (let i = 0; i < steps; i++) {
      long();
    }
    // The generator state after n draws is seed + n * 0x6d2b79f5 modulo 2^32.
    const resumed = createSeededRandom(Number((1n + BigInt(steps) * 0x6d2b79f5n) % 2n ** 32n));
    for (let i = 0; i < 5; i++) {
      const value = long();
      expect(value).toBe(resumed());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
