import { Declaration, DeclarationKind, ParameterSpec } from '../../models';
import { clauseTarget, customBaseOf } from './analysis-utils';
import { RelationshipKind } from './types';

/**
 * Minimal store surface the per-declaration pass writes through.
 */
export interface RelationshipSink {
  addRelationship(from: string, to: string, kind: RelationshipKind, details?: string): boolean;
}

const INITIALIZER_NAME = 'init';

function addParameterDependencies(
  graph: RelationshipSink,
  owner: Declaration,
  parameters: ParameterSpec[],
  context: string
): void {
  for (const parameter of parameters) {
    const target = customBaseOf(parameter.typeName, owner);
    if (target) {
      graph.addRelationship(owner.name, target, RelationshipKind.DEPENDS_ON, `parameter in: ${context}`);
    }
  }
}

/**
 * Pass 1: edges that follow from a single declaration on its own.
 * Runs on every ingestion, so it must stay idempotent.
 */
export function addStructuralRelationships(graph: RelationshipSink, declaration: Declaration): void {
  const name = declaration.name;
  const isExtension = declaration.kind === DeclarationKind.EXTENSION;

  for (const inherited of declaration.inheritedTypes) {
    const target = clauseTarget(inherited);
    if (!target) continue;
    // An extension cannot add a superclass; its clause lists conformances
    graph.addRelationship(name, target, isExtension ? RelationshipKind.CONFORMS : RelationshipKind.INHERITS);
  }

  for (const protocolName of declaration.conformedProtocols) {
    const target = clauseTarget(protocolName);
    if (target) {
      graph.addRelationship(name, target, RelationshipKind.CONFORMS);
    }
  }

  for (const property of declaration.properties) {
    const target = customBaseOf(property.typeName, declaration);
    if (target) {
      graph.addRelationship(
        name,
        target,
        property.isLet ? RelationshipKind.AGGREGATES : RelationshipKind.COMPOSES,
        `property: ${property.name}`
      );
    }
  }

  for (const method of declaration.methods) {
    const returnTarget = customBaseOf(method.returnType, declaration);
    if (returnTarget) {
      graph.addRelationship(name, returnTarget, RelationshipKind.DEPENDS_ON, `returns from: ${method.name}`);
    }
    addParameterDependencies(graph, declaration, method.parameters, method.name);
  }

  for (const initializer of declaration.initializers) {
    addParameterDependencies(graph, declaration, initializer.parameters, INITIALIZER_NAME);
  }
}
