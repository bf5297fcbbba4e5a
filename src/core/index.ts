export * from './device-registry.js';
export * from './channel-congestion-scorer.js';
export * from './wifi-environment-analyzer.js';
export * from './health-metrics-aggregator.js';
export * from './issue-deduplicator.js';
export * from './history-tracker.js';
export * from './analysis-orchestrator.js';
export * from './analysis-scheduler.js';
