export * from './address.js';
export * from './deck.types.js';
export * from './match.types.js';
export * from './receipt.js';
