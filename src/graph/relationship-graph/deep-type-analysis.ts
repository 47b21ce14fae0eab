import { Declaration, ParameterSpec } from '../../models';
import { createComponentLogger } from '../../utils/logger';
import { FALLBACK_TYPE, decompose, decomposeClosure, splitTopLevel } from '../type-decomposer';
import { clauseTarget, customBaseOf, isCustomTypeName, snapshotDeclarations } from './analysis-utils';
import { RelationshipGraph } from './graph-store';
import { RelationshipKind } from './types';

const logger = createComponentLogger('deep-type-analysis');

/**
 * Attributes that wrap a stored property in another type.
 */
export const PROPERTY_WRAPPER_ATTRIBUTES: ReadonlySet<string> = new Set([
  'State',
  'StateObject',
  'ObservedObject',
  'EnvironmentObject',
  'Environment',
  'Binding',
  'Published',
  'AppStorage',
  'SceneStorage',
  'FocusState',
  'GestureState',
  'FetchRequest',
  'Query',
]);

interface TypeContext {
  // Edge details for generic and element edges, e.g. "property: items"
  label: string;
  // Member name used in closure edge details
  member: string;
}

function addIfCustom(
  graph: RelationshipGraph,
  owner: Declaration,
  rawType: string,
  kind: RelationshipKind,
  details: string
): void {
  const target = customBaseOf(rawType, owner);
  if (target) {
    graph.addRelationship(owner.name, target, kind, details);
  }
}

/**
 * Walk a type expression and record every nested reference.
 */
export function analyzeTypeExpression(
  graph: RelationshipGraph,
  owner: Declaration,
  rawType: string,
  context: TypeContext
): void {
  const closure = decomposeClosure(rawType);
  if (closure) {
    for (const parameter of closure.parameters) {
      addIfCustom(graph, owner, parameter, RelationshipKind.DEPENDS_ON, `closure parameter in: ${context.member}`);
      analyzeTypeExpression(graph, owner, parameter, context);
    }
    if (closure.returnType) {
      addIfCustom(graph, owner, closure.returnType, RelationshipKind.DEPENDS_ON, `closure returns in: ${context.member}`);
      analyzeTypeExpression(graph, owner, closure.returnType, context);
    }
    return;
  }

  const shape = decompose(rawType);

  if (shape.isDictionary) {
    const [key, value] = shape.genericArgs;
    addIfCustom(graph, owner, value, RelationshipKind.ELEMENT_TYPE, context.label);
    analyzeTypeExpression(graph, owner, key, context);
    analyzeTypeExpression(graph, owner, value, context);
  } else if (shape.genericArgs.length > 0) {
    // A tuple carries the fallback base; its components are elements
    const kind = shape.base === FALLBACK_TYPE ? RelationshipKind.ELEMENT_TYPE : RelationshipKind.GENERIC_PARAMETER;
    for (const argument of shape.genericArgs) {
      addIfCustom(graph, owner, argument, kind, context.label);
      analyzeTypeExpression(graph, owner, argument, context);
    }
  }

  if (shape.isArray && isCustomTypeName(shape.base, owner)) {
    graph.addRelationship(owner.name, shape.base, RelationshipKind.ELEMENT_TYPE, context.label);
  }
}

function wrapperName(attributeName: string): string {
  return attributeName.replace(/^@/, '');
}

function analyzeParameters(
  graph: RelationshipGraph,
  owner: Declaration,
  parameters: ParameterSpec[],
  member: string
): void {
  for (const parameter of parameters) {
    analyzeTypeExpression(graph, owner, parameter.typeName, { label: `parameter in: ${member}`, member });
  }
}

function constraintTargets(requirement: string, owner: Declaration): string[] {
  return splitTopLevel(requirement, '&')
    .flatMap(part => splitTopLevel(part, ','))
    .map(clauseTarget)
    .filter((name): name is string => name !== null && isCustomTypeName(name, owner));
}

function analyzeDeclaration(graph: RelationshipGraph, declaration: Declaration): void {
  for (const property of declaration.properties) {
    const label = `property: ${property.name}`;
    for (const attribute of property.attributes) {
      const wrapper = wrapperName(attribute.name);
      if (PROPERTY_WRAPPER_ATTRIBUTES.has(wrapper)) {
        graph.addRelationship(declaration.name, wrapper, RelationshipKind.WRAPPED_BY, label);
      }
    }
    analyzeTypeExpression(graph, declaration, property.typeName, { label, member: property.name });
  }

  for (const method of declaration.methods) {
    analyzeParameters(graph, declaration, method.parameters, method.name);
    if (method.returnType) {
      analyzeTypeExpression(graph, declaration, method.returnType, {
        label: `returns from: ${method.name}`,
        member: method.name,
      });
    }
  }

  for (const initializer of declaration.initializers) {
    analyzeParameters(graph, declaration, initializer.parameters, 'init');
  }

  for (const subscript of declaration.subscripts) {
    analyzeParameters(graph, declaration, subscript.parameters, 'subscript');
    analyzeTypeExpression(graph, declaration, subscript.returnType, {
      label: 'returns from: subscript',
      member: 'subscript',
    });
  }

  for (const alias of declaration.typeAliases) {
    analyzeTypeExpression(graph, declaration, alias.aliasedType, {
      label: `typealias: ${alias.name}`,
      member: alias.name,
    });
  }

  for (const parameter of declaration.genericParameters) {
    if (!parameter.inheritedType) continue;
    for (const target of constraintTargets(parameter.inheritedType, declaration)) {
      graph.addRelationship(
        declaration.name,
        target,
        RelationshipKind.GENERIC_CONSTRAINT,
        `generic parameter: ${parameter.name}`
      );
    }
  }

  for (const constraint of declaration.genericConstraints) {
    for (const target of constraintTargets(constraint.requirement, declaration)) {
      graph.addRelationship(declaration.name, target, RelationshipKind.GENERIC_CONSTRAINT, `where: ${constraint.type}`);
    }
  }
}

/**
 * Pass 3: generic arguments, collection elements, closure signatures,
 * property wrappers and generic constraints.
 */
export function analyzeDeepTypeRelationships(graph: RelationshipGraph): void {
  const declarations = snapshotDeclarations(graph);
  const before = graph.getStats().relationshipCount;

  for (const declaration of declarations) {
    analyzeDeclaration(graph, declaration);
  }

  logger.debug('Deep type analysis complete', {
    declarations: declarations.length,
    relationshipsAdded: graph.getStats().relationshipCount - before,
  });
}
