import { Declaration, DeclarationKind, RequirementKind } from '../../models';
import { createComponentLogger } from '../../utils/logger';
import { referencedTypeNames, splitTopLevel } from '../type-decomposer';
import { clauseTarget, customBaseOf, isCustomTypeName, snapshotDeclarations } from './analysis-utils';
import { RelationshipGraph } from './graph-store';
import { buildConformerIndex } from './protocol-analysis';
import { RelationshipKind } from './types';

const logger = createComponentLogger('protocol-structure-analysis');

const INITIALIZER_MEMBER = 'init';
const SUBSCRIPT_MEMBER = 'subscript';

function referencedCustomTypes(rawTypes: Array<string | undefined>, owner: Declaration): string[] {
  const names = new Set<string>();
  for (const rawType of rawTypes) {
    if (!rawType) continue;
    for (const name of referencedTypeNames(rawType)) {
      if (isCustomTypeName(name, owner)) names.add(name);
    }
  }
  return Array.from(names);
}

/**
 * Member name without its argument list: `fetch(id:)` becomes `fetch`.
 */
function memberName(name: string): string {
  const paren = name.indexOf('(');
  return (paren === -1 ? name : name.substring(0, paren)).trim();
}

/**
 * Names a protocol asks its conformers to provide.
 */
export function requirementNames(protocol: Declaration): Set<string> {
  const names = new Set<string>();
  protocol.properties.forEach(property => names.add(property.name));
  protocol.methods.forEach(method => names.add(memberName(method.name)));
  if (protocol.initializers.length > 0) names.add(INITIALIZER_MEMBER);
  if (protocol.subscripts.length > 0) names.add(SUBSCRIPT_MEMBER);

  for (const requirement of protocol.protocolRequirements) {
    switch (requirement.kind) {
      case RequirementKind.INITIALIZER:
        names.add(INITIALIZER_MEMBER);
        break;
      case RequirementKind.SUBSCRIPT:
        names.add(SUBSCRIPT_MEMBER);
        break;
      case RequirementKind.ASSOCIATED_TYPE:
        break;
      default:
        names.add(memberName(requirement.name));
    }
  }
  return names;
}

/**
 * Names a concrete declaration provides.
 */
export function providedMemberNames(declaration: Declaration): Set<string> {
  const names = new Set<string>();
  declaration.properties.forEach(property => names.add(property.name));
  declaration.methods.forEach(method => names.add(memberName(method.name)));
  if (declaration.initializers.length > 0) names.add(INITIALIZER_MEMBER);
  if (declaration.subscripts.length > 0) names.add(SUBSCRIPT_MEMBER);
  return names;
}

function constraintComponents(constraint: string): string[] {
  return splitTopLevel(constraint, '&').flatMap(part => splitTopLevel(part, ','));
}

function analyzeProtocolShape(graph: RelationshipGraph, protocol: Declaration): void {
  for (const associatedType of protocol.associatedTypes) {
    graph.addRelationship(protocol.name, associatedType.name, RelationshipKind.ASSOCIATED_TYPE);

    if (associatedType.inheritedType) {
      for (const component of constraintComponents(associatedType.inheritedType)) {
        const target = clauseTarget(component);
        if (target && isCustomTypeName(target, protocol)) {
          graph.addRelationship(associatedType.name, target, RelationshipKind.TYPE_CONSTRAINT);
        }
      }
    }

    const defaultType = customBaseOf(associatedType.defaultType, protocol);
    if (defaultType) {
      graph.addRelationship(associatedType.name, defaultType, RelationshipKind.RESOLVES_ASSOCIATED_TYPE);
    }
  }

  for (const property of protocol.properties) {
    for (const target of referencedCustomTypes([property.typeName], protocol)) {
      graph.addRelationship(protocol.name, target, RelationshipKind.REQUIRES_PROPERTY, property.name);
    }
  }

  for (const method of protocol.methods) {
    const rawTypes = [...method.parameters.map(parameter => parameter.typeName), method.returnType];
    for (const target of referencedCustomTypes(rawTypes, protocol)) {
      graph.addRelationship(protocol.name, target, RelationshipKind.REQUIRES_METHOD, memberName(method.name));
    }
  }
}

function analyzeConformance(graph: RelationshipGraph, protocol: Declaration, conformer: Declaration): void {
  const associatedNames = new Set(protocol.associatedTypes.map(associatedType => associatedType.name));
  for (const alias of conformer.typeAliases) {
    if (!associatedNames.has(alias.name)) continue;
    const target = customBaseOf(alias.aliasedType, conformer);
    if (target) {
      graph.addRelationship(conformer.name, target, RelationshipKind.RESOLVES_ASSOCIATED_TYPE, alias.name);
    }
  }

  const provided = providedMemberNames(conformer);
  for (const requirement of requirementNames(protocol)) {
    if (provided.has(requirement)) {
      graph.addRelationship(conformer.name, protocol.name, RelationshipKind.FULFILLS_REQUIREMENT, requirement);
    }
  }
}

/**
 * Pass 4: associated types and member requirements of protocols, and how
 * conformers satisfy them.
 */
export function analyzeProtocolInternalStructure(graph: RelationshipGraph): void {
  const declarations = snapshotDeclarations(graph);
  const conformers = buildConformerIndex(graph, declarations);
  let protocols = 0;

  for (const protocol of declarations) {
    if (protocol.kind !== DeclarationKind.PROTOCOL) continue;
    protocols++;
    analyzeProtocolShape(graph, protocol);

    for (const conformerName of conformers.get(protocol.name) ?? []) {
      const conformer = graph.peekDeclaration(conformerName);
      if (conformer) {
        analyzeConformance(graph, protocol, conformer);
      }
    }
  }

  logger.debug('Protocol structure analysis complete', { protocols });
}
