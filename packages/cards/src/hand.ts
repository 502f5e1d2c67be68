import { sortByRankDesc, type Card } from './card.js';
import { HandNotEvaluatedError, InsufficientCardsError } from './errors.js';
import {
  compareEvaluations,
  evaluateCards,
  handRankName,
  HAND_SIZE,
  type HandEvaluation,
  type HandRank,
} from './evaluate.js';
import { formatCards } from './format.js';
import { silentLogger, type HandLogger } from './logger.js';

export interface PokerHandOptions {
  /** Evaluate right away. Defaults to true. */
  evaluate?: boolean;
  logger?: HandLogger;
}

/**
 * The best traditional "high" poker hand out of five or more cards, as in
 * Texas Hold'em where hole cards combine with the board.
 *
 * `cards` may be changed after construction; call evaluate() again to
 * pick up the change.
 */
export class PokerHand {
  cards: Card[];
  private readonly logger: HandLogger;
  private result: HandEvaluation | null = null;

  constructor(cards: readonly Card[], options: PokerHandOptions = {}) {
    if (cards.length < HAND_SIZE) {
      throw new InsufficientCardsError(cards.length);
    }
    this.cards = sortByRankDesc(cards);
    this.logger = options.logger ?? silentLogger;
    if (options.evaluate ?? true) {
      this.evaluate();
    }
  }

  evaluate(): void {
    this.cards = sortByRankDesc(this.cards);
    this.result = evaluateCards(this.cards, this.logger);
  }

  get isEvaluated(): boolean {
    return this.result !== null;
  }

  get handRank(): HandRank {
    return this.evaluation.handRank;
  }

  get handName(): string {
    return handRankName(this.evaluation.handRank);
  }

  get handCards(): readonly Card[] {
    return this.evaluation.handCards;
  }

  get kickers(): readonly Card[] {
    return this.evaluation.kickers;
  }

  get evaluation(): Readonly<HandEvaluation> {
    if (!this.result) {
      throw new HandNotEvaluatedError();
    }
    return this.result;
  }

  compareTo(other: PokerHand): number {
    return compareEvaluations(this.evaluation, other.evaluation);
  }

  /** e.g. 'Two Pair: KS,KD,5C,5H / AS' */
  describe(): string {
    const { handCards, kickers } = this.evaluation;
    const kickerPart = kickers.length > 0 ? ` / ${formatCards(kickers)}` : '';
    return `${this.handName}: ${formatCards(handCards)}${kickerPart}`;
  }

  toString(): string {
    return `[${formatCards(this.cards)}]`;
  }
}

/**
 * Returns: -1 if a is weaker, +1 if a is stronger, 0 on a tie
 */
export function compareHands(a: PokerHand, b: PokerHand): number {
  return a.compareTo(b);
}
