import { formatCard, type Card } from './card.js';

export function formatCards(cards: readonly Card[], separator = ','): string {
  return cards.map(formatCard).join(separator);
}

/**
 * Render several card groups, e.g. the pairs found in a hand:
 * 'KS,KD / 5C,5H'
 */
export function formatCardGroups(groups: readonly (readonly Card[])[], separator = ' / '): string {
  return groups.map((group) => formatCards(group)).join(separator);
}
