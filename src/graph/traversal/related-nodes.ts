import { config } from '../../utils/config';
import { createComponentLogger } from '../../utils/logger';
import { RelationshipGraph } from '../relationship-graph/graph-store';
import { GraphNode, Relationship } from '../relationship-graph/types';
import {
  MODE_FILTERS,
  RELATIONSHIP_PRIORITY,
  TraversalMode,
  TraversalOptions,
  isTraversalMode,
  relationshipCost,
} from './types';

const logger = createComponentLogger('traversal');

export class TraversalOptionsError extends Error {
  constructor(
    message: string,
    public readonly option: keyof TraversalOptions
  ) {
    super(message);
    this.name = 'TraversalOptionsError';
  }
}

interface WorkItem {
  name: string;
  remainingBudget: number;
  priority: number;
  sequence: number;
}

interface Neighbor {
  name: string;
  relationship: Relationship;
}

function compareWorkItems(a: WorkItem, b: WorkItem): number {
  return (
    b.remainingBudget - a.remainingBudget ||
    b.priority - a.priority ||
    a.sequence - b.sequence
  );
}

// The work list is kept in reverse expansion order so the next item pops off the end
function insertWorkItem(workList: WorkItem[], item: WorkItem): void {
  let low = 0;
  let high = workList.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if (compareWorkItems(workList[middle], item) > 0) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  workList.splice(low, 0, item);
}

function resolveOptions(options: TraversalOptions): Required<TraversalOptions> {
  const maxDepth = options.maxDepth ?? config.traversal.defaultMaxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new TraversalOptionsError(`maxDepth must be a non-negative integer, got ${maxDepth}`, 'maxDepth');
  }

  const mode = options.mode ?? TraversalMode.STANDARD;
  if (!isTraversalMode(mode)) {
    throw new TraversalOptionsError(`Unknown traversal mode "${String(mode)}"`, 'mode');
  }

  return { maxDepth, mode, includeDescendants: options.includeDescendants ?? false };
}

function neighborsOf(
  graph: RelationshipGraph,
  name: string,
  options: Required<TraversalOptions>
): Neighbor[] {
  const filter = MODE_FILTERS[options.mode];
  const followIncoming = options.mode !== TraversalMode.INHERITANCE_ONLY || options.includeDescendants;
  const neighbors: Neighbor[] = [];

  for (const relationship of graph.getOutgoing(name)) {
    if (!filter || filter.has(relationship.kind)) {
      neighbors.push({ name: relationship.to, relationship });
    }
  }

  if (followIncoming) {
    for (const relationship of graph.getIncoming(name)) {
      if (!filter || filter.has(relationship.kind)) {
        neighbors.push({ name: relationship.from, relationship });
      }
    }
  }

  return neighbors;
}

/**
 * Neighborhood of `root` within a cost budget of `maxDepth`.
 *
 * Cheaper edges (inheritance, conformance, generics) reach further than
 * composition or dependency edges. Entries are expanded by remaining budget,
 * then edge priority, then discovery order; a node is visited once, with the
 * largest budget any path leaves for it. Returns copies, root first, or an
 * empty list for an unknown root.
 */
export function related(graph: RelationshipGraph, root: string, options: TraversalOptions = {}): GraphNode[] {
  const resolved = resolveOptions(options);

  if (!graph.hasNode(root)) {
    logger.debug('Traversal root not found', { root });
    return [];
  }

  const visited = new Set<string>();
  const order: string[] = [];
  const bestBudget = new Map<string, number>([[root, resolved.maxDepth]]);
  let sequence = 0;
  const workList: WorkItem[] = [
    { name: root, remainingBudget: resolved.maxDepth, priority: Number.POSITIVE_INFINITY, sequence: sequence++ },
  ];

  while (workList.length > 0) {
    const current = workList.pop();
    if (!current || visited.has(current.name)) {
      continue;
    }

    visited.add(current.name);
    order.push(current.name);

    for (const neighbor of neighborsOf(graph, current.name, resolved)) {
      if (visited.has(neighbor.name)) continue;

      const remainingBudget = current.remainingBudget - relationshipCost(neighbor.relationship.kind);
      if (remainingBudget < 0) continue;
      if ((bestBudget.get(neighbor.name) ?? -1) >= remainingBudget) continue;

      bestBudget.set(neighbor.name, remainingBudget);
      insertWorkItem(workList, {
        name: neighbor.name,
        remainingBudget,
        priority: RELATIONSHIP_PRIORITY[neighbor.relationship.kind],
        sequence: sequence++,
      });
    }
  }

  logger.debug('Traversal complete', {
    root,
    mode: resolved.mode,
    maxDepth: resolved.maxDepth,
    visited: order.length,
  });

  const nodes: GraphNode[] = [];
  for (const name of order) {
    const node = graph.getNode(name);
    if (node) nodes.push(node);
  }
  return nodes;
}
