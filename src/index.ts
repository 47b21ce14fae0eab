/**
 * type-relationship-graph - relationship graphs over type declarations
 *
 * Main entry point for library usage: ingest declarations, run the
 * relationship analysis and query or export the resulting graph.
 */

export * from './models';
export * from './graph';
export * from './input';
export * from './utils';

// Main components for programmatic usage
export { GraphBuilder } from './graph/builder';
export { RelationshipGraph } from './graph/relationship-graph';
export { related } from './graph/traversal';
export { logger, config } from './utils';
