import {
  DEEP_TYPE_KINDS,
  PROTOCOL_IMPLEMENTATION_KINDS,
  PROTOCOL_INTERNAL_KINDS,
  RelationshipKind,
} from '../relationship-graph/types';

export enum TraversalMode {
  STANDARD = 'standard',
  INHERITANCE_ONLY = 'inheritanceOnly',
  COMPOSITION_ONLY = 'compositionOnly',
  PROTOCOL_ONLY = 'protocolOnly',
}

export interface TraversalOptions {
  maxDepth?: number;
  mode?: TraversalMode;
  // Only meaningful for inheritanceOnly: also walk edges pointing at the node
  includeDescendants?: boolean;
}

/**
 * Expansion order among entries with the same remaining budget. Higher first.
 */
export const RELATIONSHIP_PRIORITY: Record<RelationshipKind, number> = {
  [RelationshipKind.INHERITS]: 100,
  [RelationshipKind.PROTOCOL_INHERITS]: 100,
  [RelationshipKind.CONFORMS]: 90,
  [RelationshipKind.IMPLEMENTS]: 90,
  [RelationshipKind.ASSOCIATED_TYPE]: 80,
  [RelationshipKind.GENERIC_PARAMETER]: 80,
  [RelationshipKind.GENERIC_CONSTRAINT]: 80,
  [RelationshipKind.COMPOSES]: 70,
  [RelationshipKind.AGGREGATES]: 60,
  [RelationshipKind.DEPENDS_ON]: 50,
  [RelationshipKind.INJECTED_VIA]: 40,
  [RelationshipKind.WRAPPED_BY]: 30,
  [RelationshipKind.ELEMENT_TYPE]: 30,
  [RelationshipKind.TYPE_CONSTRAINT]: 30,
  [RelationshipKind.REQUIRES_METHOD]: 30,
  [RelationshipKind.REQUIRES_PROPERTY]: 30,
  [RelationshipKind.FULFILLS_REQUIREMENT]: 30,
  [RelationshipKind.RESOLVES_ASSOCIATED_TYPE]: 30,
};

const UNIT_COST_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.INHERITS,
  RelationshipKind.PROTOCOL_INHERITS,
  RelationshipKind.CONFORMS,
  RelationshipKind.IMPLEMENTS,
  RelationshipKind.GENERIC_PARAMETER,
  RelationshipKind.GENERIC_CONSTRAINT,
  RelationshipKind.ASSOCIATED_TYPE,
]);

export function relationshipCost(kind: RelationshipKind): number {
  return UNIT_COST_KINDS.has(kind) ? 1 : 2;
}

const INHERITANCE_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.INHERITS,
  RelationshipKind.PROTOCOL_INHERITS,
  RelationshipKind.CONFORMS,
  RelationshipKind.IMPLEMENTS,
]);

const COMPOSITION_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.COMPOSES,
  RelationshipKind.AGGREGATES,
  RelationshipKind.DEPENDS_ON,
  ...DEEP_TYPE_KINDS,
]);

const PROTOCOL_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.CONFORMS,
  ...PROTOCOL_IMPLEMENTATION_KINDS,
  ...PROTOCOL_INTERNAL_KINDS,
]);

/**
 * Edge kinds a mode follows; null means every kind.
 */
export const MODE_FILTERS: Record<TraversalMode, ReadonlySet<RelationshipKind> | null> = {
  [TraversalMode.STANDARD]: null,
  [TraversalMode.INHERITANCE_ONLY]: INHERITANCE_KINDS,
  [TraversalMode.COMPOSITION_ONLY]: COMPOSITION_KINDS,
  [TraversalMode.PROTOCOL_ONLY]: PROTOCOL_KINDS,
};

export function isTraversalMode(value: string): value is TraversalMode {
  return Object.values<string>(TraversalMode).includes(value);
}
