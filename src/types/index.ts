export * from './network.js';
export * from './analysis.js';
