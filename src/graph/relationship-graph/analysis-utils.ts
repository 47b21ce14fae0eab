import { Declaration } from '../../models';
import { FALLBACK_TYPE, decompose, isBuiltinType } from '../type-decomposer';
import type { RelationshipGraph } from './graph-store';

/**
 * A name worth an edge: not a builtin, not the fallback and not one of the
 * owner's own generic parameters.
 */
export function isCustomTypeName(name: string, owner: Declaration): boolean {
  if (!name || name === FALLBACK_TYPE || isBuiltinType(name)) {
    return false;
  }
  return !owner.genericParameters.some(parameter => parameter.name === name);
}

/**
 * Decomposed base of a raw type expression when it is a custom type, else null.
 */
export function customBaseOf(rawType: string | undefined, owner: Declaration): string | null {
  if (!rawType) {
    return null;
  }
  const { base } = decompose(rawType);
  return isCustomTypeName(base, owner) ? base : null;
}

/**
 * Base name of an entry in an inheritance clause (`Repository<User>` names
 * `Repository`). Builtins are kept: `Error` is a real supertype.
 */
export function clauseTarget(entry: string): string | null {
  const { base } = decompose(entry);
  return base === FALLBACK_TYPE ? null : base;
}

export function clauseTargets(entries: string[]): string[] {
  const targets = new Set<string>();
  for (const entry of entries) {
    const target = clauseTarget(entry);
    if (target) targets.add(target);
  }
  return Array.from(targets);
}

/**
 * Declarations present when a pass starts. Phantoms created while the pass
 * runs are never analyzed by it.
 */
export function snapshotDeclarations(graph: RelationshipGraph): Declaration[] {
  const declarations: Declaration[] = [];
  for (const name of graph.nodeNames()) {
    const declaration = graph.peekDeclaration(name);
    if (declaration) declarations.push(declaration);
  }
  return declarations;
}
