import { AccessLevel, Declaration, DeclarationKind, EXTERNAL_LOCATION, createDeclaration } from '../../models';
import { createComponentLogger } from '../../utils/logger';
import { ExternalTypeClassifier, PresumedKind } from '../../utils/external-type-classifier';
import { GraphNode, RelationshipKind } from './types';

const logger = createComponentLogger('phantom-nodes');

/**
 * The slice of the graph store that phantom synthesis needs.
 */
export interface PhantomHost {
  readonly classifier: ExternalTypeClassifier;
  hasNode(name: string): boolean;
  getNode(name: string): GraphNode | undefined;
  insertPhantom(declaration: Declaration): void;
  addRelationship(from: string, to: string, kind: RelationshipKind, details?: string): boolean;
}

const PRESUMED_KIND_TO_DECLARATION: Record<PresumedKind, DeclarationKind> = {
  class: DeclarationKind.CLASS,
  struct: DeclarationKind.STRUCT,
  protocol: DeclarationKind.PROTOCOL,
};

export function createPhantomDeclaration(
  name: string,
  kind: DeclarationKind,
  moduleName: string | null
): Declaration {
  return createDeclaration({
    name,
    kind,
    moduleName: moduleName ?? undefined,
    accessLevel: AccessLevel.OPEN,
    location: { ...EXTERNAL_LOCATION },
    isPhantom: true,
  });
}

/**
 * Make sure a node named `name` exists, synthesizing a phantom for a type that
 * was referenced but never declared. Well-known framework classes also get
 * their ancestry, each link as a phantom with an inherits edge from the
 * previous one.
 */
export function ensureTarget(host: PhantomHost, name: string): GraphNode {
  if (!host.hasNode(name)) {
    const classification = host.classifier.classifyExternal(name);
    const kind = PRESUMED_KIND_TO_DECLARATION[classification.kind];

    host.insertPhantom(createPhantomDeclaration(name, kind, classification.moduleName));
    logger.debug('Created phantom node', {
      name,
      kind,
      moduleName: classification.moduleName,
      rule: classification.matchedRule,
    });

    if (kind === DeclarationKind.CLASS) {
      let previous = name;
      for (const ancestor of host.classifier.knownBaseChain(name)) {
        host.addRelationship(previous, ancestor, RelationshipKind.INHERITS);
        previous = ancestor;
      }
    }
  }

  const node = host.getNode(name);
  if (!node) {
    throw new Error(`Phantom synthesis failed to create node "${name}"`);
  }
  return node;
}
