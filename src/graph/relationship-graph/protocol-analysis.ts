import { Declaration, DeclarationKind, isConcreteKind } from '../../models';
import { createComponentLogger } from '../../utils/logger';
import { clauseTargets, customBaseOf, snapshotDeclarations } from './analysis-utils';
import { RelationshipGraph } from './graph-store';
import { RelationshipKind } from './types';

const logger = createComponentLogger('protocol-analysis');

/**
 * Protocols a concrete declaration conforms to: everything in its conformance
 * list, plus inheritance-clause names that resolve to protocol nodes.
 */
export function conformedProtocolsOf(graph: RelationshipGraph, declaration: Declaration): string[] {
  const protocols = new Set(clauseTargets(declaration.conformedProtocols));
  for (const inherited of clauseTargets(declaration.inheritedTypes)) {
    if (graph.peekDeclaration(inherited)?.kind === DeclarationKind.PROTOCOL) {
      protocols.add(inherited);
    }
  }
  return Array.from(protocols);
}

/**
 * Map of protocol name to the concrete declarations conforming to it.
 */
export function buildConformerIndex(
  graph: RelationshipGraph,
  declarations: Declaration[]
): Map<string, string[]> {
  const conformers = new Map<string, string[]>();
  for (const declaration of declarations) {
    if (!isConcreteKind(declaration.kind)) continue;
    for (const protocolName of conformedProtocolsOf(graph, declaration)) {
      const list = conformers.get(protocolName) ?? [];
      list.push(declaration.name);
      conformers.set(protocolName, list);
    }
  }
  return conformers;
}

function isProtocolReference(
  graph: RelationshipGraph,
  name: string,
  conformers: Map<string, string[]>
): boolean {
  const declaration = graph.peekDeclaration(name);
  if (declaration?.kind === DeclarationKind.PROTOCOL || conformers.has(name)) {
    return true;
  }
  return graph.classifier.isProtocolLike(name);
}

function addInjectionEdges(
  graph: RelationshipGraph,
  owner: Declaration,
  member: { name: string; typeName: string },
  conformers: Map<string, string[]>
): number {
  const target = customBaseOf(member.typeName, owner);
  if (!target || !isProtocolReference(graph, target, conformers)) {
    return 0;
  }

  let added = 0;
  for (const implementation of conformers.get(target) ?? []) {
    if (implementation === owner.name) continue;
    if (graph.addRelationship(owner.name, implementation, RelationshipKind.INJECTED_VIA, member.name)) {
      added++;
    }
  }
  return added;
}

/**
 * Pass 2: protocol inheritance, implementations and protocol-typed injection
 * points. Needs every declaration ingested.
 */
export function analyzeProtocolRelationships(graph: RelationshipGraph): void {
  const declarations = snapshotDeclarations(graph);
  const conformers = buildConformerIndex(graph, declarations);
  let protocolInherits = 0;
  let implementations = 0;
  let injections = 0;

  for (const declaration of declarations) {
    if (declaration.kind === DeclarationKind.PROTOCOL) {
      const parents = clauseTargets([...declaration.inheritedTypes, ...declaration.conformedProtocols]);
      for (const parent of parents) {
        if (graph.addRelationship(declaration.name, parent, RelationshipKind.PROTOCOL_INHERITS)) {
          protocolInherits++;
        }
      }
      continue;
    }

    if (isConcreteKind(declaration.kind)) {
      for (const protocolName of conformedProtocolsOf(graph, declaration)) {
        if (graph.addRelationship(declaration.name, protocolName, RelationshipKind.IMPLEMENTS)) {
          implementations++;
        }
      }
    }

    for (const property of declaration.properties) {
      injections += addInjectionEdges(graph, declaration, property, conformers);
    }
    for (const initializer of declaration.initializers) {
      for (const parameter of initializer.parameters) {
        injections += addInjectionEdges(graph, declaration, parameter, conformers);
      }
    }
  }

  logger.debug('Protocol analysis complete', { protocolInherits, implementations, injections });
}
