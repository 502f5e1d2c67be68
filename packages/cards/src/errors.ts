export type CardsErrorCode =
  | 'INVALID_RANK'
  | 'INVALID_SUIT'
  | 'EMPTY_DECK'
  | 'CARD_NOT_REMOVED'
  | 'INSUFFICIENT_CARDS'
  | 'HAND_NOT_EVALUATED'
  | 'DUPLICATE_CARD'
  | 'INVALID_POSITION';

/**
 * Base class for every error thrown by the cards package.
 * `code` is stable and safe to send over the wire.
 */
export class CardsError extends Error {
  readonly code: CardsErrorCode;

  constructor(code: CardsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRankError extends CardsError {
  constructor(readonly value: string) {
    super('INVALID_RANK', `Invalid rank: ${JSON.stringify(value)}`);
  }
}

export class InvalidSuitError extends CardsError {
  constructor(readonly value: string) {
    super('INVALID_SUIT', `Invalid suit: ${JSON.stringify(value)}`);
  }
}

export class EmptyDeckError extends CardsError {
  constructor() {
    super('EMPTY_DECK', 'No active cards left in the deck');
  }
}

export class CardNotRemovedError extends CardsError {
  constructor(readonly card: string) {
    super('CARD_NOT_REMOVED', `Card ${card} is not among popped or discarded cards`);
  }
}

export class InsufficientCardsError extends CardsError {
  constructor(readonly count: number) {
    super('INSUFFICIENT_CARDS', `A poker hand needs at least 5 cards, got ${count}`);
  }
}

export class HandNotEvaluatedError extends CardsError {
  constructor() {
    super('HAND_NOT_EVALUATED', 'Hand has not been evaluated yet');
  }
}

export class DuplicateCardError extends CardsError {
  constructor(readonly card: string) {
    super('DUPLICATE_CARD', `Card ${card} appears more than once`);
  }
}

export class InvalidPositionError extends CardsError {
  constructor(readonly value: string) {
    super('INVALID_POSITION', `Invalid deck position: ${JSON.stringify(value)}, expected "top" or "bottom"`);
  }
}
