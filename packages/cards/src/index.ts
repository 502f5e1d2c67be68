export * from './card.js';
export * from './deck.js';
export * from './errors.js';
export * from './evaluate.js';
export * from './format.js';
export * from './hand.js';
export * from './logger.js';
export * from './showdown.js';
