export type { EvolutionConstraint } from './types.js';
export { createNameChangeConstraint } from './name-change.js';
export { createCategoryChangeConstraint } from './category-change.js';
export { createEnrichmentStrategyChangeConstraint } from './enrichment-strategy-change.js';
export { createCompatibilityModeChangeConstraint } from './compatibility-mode-change.js';
export { createPartitionStrategyChangeConstraint } from './partition-strategy-change.js';
export { createPartitionKeyFieldsChangeConstraint } from './partition-key-fields-change.js';
