// Type definitions
export * from './types';

// Store and ingestion
export { RelationshipGraph } from './graph-store';
export { isExtensionMerge, mergeExtension } from './declaration-merge';
export { ensureTarget, createPhantomDeclaration } from './phantom-node-handler';
export type { PhantomHost } from './phantom-node-handler';

// Analysis passes
export { addStructuralRelationships } from './structural-analysis';
export type { RelationshipSink } from './structural-analysis';
export { analyzeProtocolRelationships, buildConformerIndex, conformedProtocolsOf } from './protocol-analysis';
export { analyzeDeepTypeRelationships, PROPERTY_WRAPPER_ATTRIBUTES } from './deep-type-analysis';
export {
  analyzeProtocolInternalStructure,
  requirementNames,
  providedMemberNames,
} from './protocol-structure-analysis';
export { isCustomTypeName, customBaseOf } from './analysis-utils';
