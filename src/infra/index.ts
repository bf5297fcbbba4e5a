export * from './sources.js';
export * from './snapshot-normalizer.js';
export * from './snapshot-sources.js';
export * from './wifi-scan-parser.js';
