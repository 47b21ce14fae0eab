import { Declaration, DeclarationKind, EXTENDABLE_KINDS } from '../../models';

/**
 * True when exactly one side is an extension and the other is a class, struct
 * or actor. Any other pairing of same-named declarations is a replacement.
 */
export function isExtensionMerge(existing: Declaration, incoming: Declaration): boolean {
  const existingIsExtension = existing.kind === DeclarationKind.EXTENSION;
  const incomingIsExtension = incoming.kind === DeclarationKind.EXTENSION;

  if (existingIsExtension === incomingIsExtension) {
    return false;
  }

  const primary = existingIsExtension ? incoming : existing;
  return EXTENDABLE_KINDS.has(primary.kind);
}

function unionNames(...lists: string[][]): string[] {
  return Array.from(new Set(lists.flat()));
}

/**
 * Fold an extension into its primary declaration. The argument order does not
 * matter: the primary's members always come first.
 */
export function mergeExtension(a: Declaration, b: Declaration): Declaration {
  const [primary, extension] = a.kind === DeclarationKind.EXTENSION ? [b, a] : [a, b];

  return {
    ...primary,
    // An extension's inheritance clause can only add conformances
    conformedProtocols: unionNames(
      primary.conformedProtocols,
      extension.conformedProtocols,
      extension.inheritedTypes
    ),
    properties: [...primary.properties, ...extension.properties],
    methods: [...primary.methods, ...extension.methods],
    initializers: [...primary.initializers, ...extension.initializers],
    subscripts: [...primary.subscripts, ...extension.subscripts],
    typeAliases: [...primary.typeAliases, ...extension.typeAliases],
    nestedTypes: [...primary.nestedTypes, ...extension.nestedTypes],
    associatedTypes: [...primary.associatedTypes, ...extension.associatedTypes],
    protocolRequirements: [...primary.protocolRequirements, ...extension.protocolRequirements],
    genericParameters: [...primary.genericParameters, ...extension.genericParameters],
    genericConstraints: [...primary.genericConstraints, ...extension.genericConstraints],
    attributes: [...primary.attributes, ...extension.attributes],
    isPhantom: primary.isPhantom && extension.isPhantom,
  };
}
