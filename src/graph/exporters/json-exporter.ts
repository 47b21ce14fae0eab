import { Declaration } from '../../models';
import { config } from '../../utils/config';
import { RelationshipGraph } from '../relationship-graph/graph-store';
import { GraphNode, Relationship, compareNames, compareRelationships } from '../relationship-graph/types';
import { related } from '../traversal/related-nodes';
import { TraversalMode } from '../traversal/types';

export interface JsonGraphNode {
  type: Declaration;
  relationships: Relationship[];
}

export interface JsonGraphDocument {
  nodes: JsonGraphNode[];
}

export interface JsonExportOptions {
  focus?: string;
  depth?: number;
  mode?: TraversalMode;
  includeDescendants?: boolean;
}

/**
 * Every node with its outgoing edges: nodes by name, edges by target, kind and details.
 * With `focus`, only the neighborhood of that type and the edges inside it.
 */
export function exportJsonGraph(graph: RelationshipGraph, options: JsonExportOptions = {}): JsonGraphDocument {
  const selected: GraphNode[] = options.focus
    ? related(graph, options.focus, {
        maxDepth: options.depth ?? config.traversal.defaultMaxDepth,
        mode: options.mode,
        includeDescendants: options.includeDescendants,
      })
    : graph.allNodes();
  const selectedNames = new Set(selected.map(node => node.declaration.name));

  const nodes = selected
    .sort((a, b) => compareNames(a.declaration.name, b.declaration.name))
    .map(node => ({
      type: node.declaration,
      relationships: node.relationships
        .filter(relationship => selectedNames.has(relationship.to))
        .sort(compareRelationships),
    }));

  return { nodes };
}
