import { Declaration } from '../../models';

export enum RelationshipKind {
  // Structural
  INHERITS = 'inherits',
  CONFORMS = 'conforms',
  COMPOSES = 'composes',
  AGGREGATES = 'aggregates',
  DEPENDS_ON = 'depends_on',
  // Protocol implementation
  IMPLEMENTS = 'implements',
  PROTOCOL_INHERITS = 'protocol_inherits',
  INJECTED_VIA = 'injected_via',
  FULFILLS_REQUIREMENT = 'fulfills_requirement',
  // Deep type
  GENERIC_PARAMETER = 'generic_parameter',
  GENERIC_CONSTRAINT = 'generic_constraint',
  WRAPPED_BY = 'wrapped_by',
  ELEMENT_TYPE = 'element_type',
  // Protocol internal structure
  ASSOCIATED_TYPE = 'associated_type',
  TYPE_CONSTRAINT = 'type_constraint',
  REQUIRES_METHOD = 'requires_method',
  REQUIRES_PROPERTY = 'requires_property',
  RESOLVES_ASSOCIATED_TYPE = 'resolves_associated_type',
}

export const STRUCTURAL_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.INHERITS,
  RelationshipKind.CONFORMS,
  RelationshipKind.COMPOSES,
  RelationshipKind.AGGREGATES,
  RelationshipKind.DEPENDS_ON,
]);

export const PROTOCOL_IMPLEMENTATION_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.IMPLEMENTS,
  RelationshipKind.PROTOCOL_INHERITS,
  RelationshipKind.INJECTED_VIA,
  RelationshipKind.FULFILLS_REQUIREMENT,
]);

export const DEEP_TYPE_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.GENERIC_PARAMETER,
  RelationshipKind.GENERIC_CONSTRAINT,
  RelationshipKind.WRAPPED_BY,
  RelationshipKind.ELEMENT_TYPE,
]);

export const PROTOCOL_INTERNAL_KINDS: ReadonlySet<RelationshipKind> = new Set([
  RelationshipKind.ASSOCIATED_TYPE,
  RelationshipKind.TYPE_CONSTRAINT,
  RelationshipKind.REQUIRES_METHOD,
  RelationshipKind.REQUIRES_PROPERTY,
  RelationshipKind.RESOLVES_ASSOCIATED_TYPE,
]);

export interface Relationship {
  from: string;
  to: string;
  kind: RelationshipKind;
  details?: string;
}

/**
 * A declaration together with the edges it is the source of.
 * Always a copy; mutating it does not touch the graph.
 */
export interface GraphNode {
  declaration: Declaration;
  relationships: Relationship[];
}

export interface IntegrityWarning {
  relationship: Relationship;
  message: string;
}

export interface GraphStats {
  nodeCount: number;
  phantomCount: number;
  relationshipCount: number;
  relationshipsByKind: Partial<Record<RelationshipKind, number>>;
  integrityWarningCount: number;
}

export function relationshipKey(relationship: Relationship): string {
  return JSON.stringify([
    relationship.from,
    relationship.to,
    relationship.kind,
    relationship.details ?? null,
  ]);
}

// Code-point order, so output does not depend on the host locale
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareRelationships(a: Relationship, b: Relationship): number {
  return (
    compareNames(a.to, b.to) ||
    compareNames(a.kind, b.kind) ||
    compareNames(a.details ?? '', b.details ?? '')
  );
}
