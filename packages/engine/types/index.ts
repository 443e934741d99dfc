export * from './scoring.js';
export * from './supply-chain.js';
export * from './forecast.js';
export * from './products.js';
export * from './catalog.js';
