import { Declaration } from '../models';
import { ExternalTypeClassifier } from '../utils/external-type-classifier';
import { createComponentLogger } from '../utils/logger';
import {
  GraphStats,
  IntegrityWarning,
  RelationshipGraph,
  analyzeDeepTypeRelationships,
  analyzeProtocolInternalStructure,
  analyzeProtocolRelationships,
} from './relationship-graph';

const logger = createComponentLogger('graph-builder');

export interface BuildOptions {
  classifier?: ExternalTypeClassifier;
}

export interface BuildResult {
  graph: RelationshipGraph;
  stats: GraphStats;
  integrityWarnings: IntegrityWarning[];
  declarationsIngested: number;
  durationMs: number;
}

/**
 * Nested declarations become nodes of their own, parents before children.
 */
export function flattenDeclarations(declarations: Declaration[]): Declaration[] {
  const flattened: Declaration[] = [];
  const pending = [...declarations];

  while (pending.length > 0) {
    const declaration = pending.shift();
    if (!declaration) break;
    flattened.push(declaration);
    pending.push(...declaration.nestedTypes);
  }

  return flattened;
}

/**
 * GraphBuilder - Main Orchestrator
 *
 * Ingests every declaration (structural edges are recorded on the way in),
 * then runs the global passes, which need the complete set of nodes:
 * - analyzeProtocolRelationships: protocol inheritance, implementations, injection
 * - analyzeDeepTypeRelationships: generics, collections, closures, wrappers
 * - analyzeProtocolInternalStructure: associated types and requirements
 */
export class GraphBuilder {
  private readonly classifier?: ExternalTypeClassifier;

  constructor(options: BuildOptions = {}) {
    this.classifier = options.classifier;
  }

  build(declarations: Declaration[]): BuildResult {
    const startTime = Date.now();
    const graph = new RelationshipGraph(this.classifier);
    const all = flattenDeclarations(declarations);

    logger.info('Starting relationship analysis', {
      declarations: declarations.length,
      withNested: all.length,
    });

    for (const declaration of all) {
      graph.addDeclaration(declaration);
    }

    // Barrier: the global passes query all nodes and all conformers
    analyzeProtocolRelationships(graph);
    analyzeDeepTypeRelationships(graph);
    analyzeProtocolInternalStructure(graph);
    graph.markAnalyzed();

    const stats = graph.getStats();
    const integrityWarnings = graph.getIntegrityWarnings();
    const durationMs = Date.now() - startTime;

    if (integrityWarnings.length > 0) {
      logger.warn(`Relationship analysis finished with ${integrityWarnings.length} integrity warnings`);
    }

    logger.info('Relationship analysis completed', {
      duration: durationMs,
      nodes: stats.nodeCount,
      phantoms: stats.phantomCount,
      relationships: stats.relationshipCount,
    });

    return {
      graph,
      stats,
      integrityWarnings,
      declarationsIngested: all.length,
      durationMs,
    };
  }
}
