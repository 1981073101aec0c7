// Domain layer exports - pure scoring logic, no external deps

// Dice
export * from './dice/roll.js';

// Scoring
export * from './scoring/types.js';
export * from './scoring/patterns.js';
export * from './scoring/category.js';
export * from './scoring/catalog.js';
export * from './scoring/validators.js';
export * from './scoring/scoresheet.js';
