/**
 * Declaration models produced by the source front end and consumed by the graph engine
 */

export enum DeclarationKind {
  CLASS = 'class',
  STRUCT = 'struct',
  PROTOCOL = 'protocol',
  ENUM = 'enum',
  ACTOR = 'actor',
  EXTENSION = 'extension',
}

export enum AccessLevel {
  PRIVATE = 'private',
  FILEPRIVATE = 'fileprivate',
  INTERNAL = 'internal',
  PUBLIC = 'public',
  OPEN = 'open',
}

export enum RequirementKind {
  PROPERTY = 'property',
  METHOD = 'method',
  INITIALIZER = 'initializer',
  SUBSCRIPT = 'subscript',
  ASSOCIATED_TYPE = 'associatedType',
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
}

export interface AttributeSpec {
  name: string;
  arguments: string[];
}

export interface PropertySpec {
  name: string;
  typeName: string;
  accessLevel: AccessLevel;
  isLet: boolean;
  isStatic: boolean;
  isLazy: boolean;
  isWeak: boolean;
  isUnowned: boolean;
  isComputed: boolean;
  defaultValue?: string;
  attributes: AttributeSpec[];
}

export interface ParameterSpec {
  label?: string;
  name: string;
  typeName: string;
  defaultValue?: string;
  isInout: boolean;
  isVariadic: boolean;
}

export interface MethodSpec {
  name: string;
  parameters: ParameterSpec[];
  returnType?: string;
  accessLevel: AccessLevel;
  isStatic: boolean;
  isAsync: boolean;
  throws: boolean;
}

export interface InitializerSpec {
  parameters: ParameterSpec[];
  accessLevel: AccessLevel;
  isFailable: boolean;
  isAsync: boolean;
  throws: boolean;
}

export interface SubscriptSpec {
  parameters: ParameterSpec[];
  returnType: string;
  accessLevel: AccessLevel;
  isStatic: boolean;
}

export interface TypeAliasSpec {
  name: string;
  aliasedType: string;
  accessLevel: AccessLevel;
}

export interface AssociatedTypeSpec {
  name: string;
  inheritedType?: string; // Constraint, e.g. "Hashable & Codable"
  defaultType?: string;
}

export interface ProtocolRequirementSpec {
  kind: RequirementKind;
  name: string;
  signature: string;
  isOptional: boolean;
}

export interface GenericParameterSpec {
  name: string;
  inheritedType?: string;
}

export interface GenericConstraintSpec {
  type: string;
  requirement: string;
}

export interface Declaration {
  name: string;
  kind: DeclarationKind;
  moduleName?: string;
  accessLevel: AccessLevel;
  inheritedTypes: string[];
  conformedProtocols: string[];
  properties: PropertySpec[];
  methods: MethodSpec[];
  initializers: InitializerSpec[];
  subscripts: SubscriptSpec[];
  typeAliases: TypeAliasSpec[];
  nestedTypes: Declaration[];
  associatedTypes: AssociatedTypeSpec[];
  protocolRequirements: ProtocolRequirementSpec[];
  genericParameters: GenericParameterSpec[];
  genericConstraints: GenericConstraintSpec[];
  attributes: AttributeSpec[];
  location: SourceLocation;
  isPhantom: boolean;
}

export const EXTERNAL_LOCATION: SourceLocation = {
  file: '<external>',
  line: 0,
  column: 0,
};

// Kinds that carry a concrete implementation and can satisfy a protocol
export const CONCRETE_KINDS: ReadonlySet<DeclarationKind> = new Set([
  DeclarationKind.CLASS,
  DeclarationKind.STRUCT,
  DeclarationKind.ACTOR,
  DeclarationKind.ENUM,
]);

// Kinds an extension merges into
export const EXTENDABLE_KINDS: ReadonlySet<DeclarationKind> = new Set([
  DeclarationKind.CLASS,
  DeclarationKind.STRUCT,
  DeclarationKind.ACTOR,
]);

export function isConcreteKind(kind: DeclarationKind): boolean {
  return CONCRETE_KINDS.has(kind);
}

/**
 * Build a declaration with empty member lists. Used for phantom nodes and tests.
 */
export function createDeclaration(
  init: Pick<Declaration, 'name' | 'kind'> & Partial<Declaration>
): Declaration {
  return {
    accessLevel: AccessLevel.INTERNAL,
    inheritedTypes: [],
    conformedProtocols: [],
    properties: [],
    methods: [],
    initializers: [],
    subscripts: [],
    typeAliases: [],
    nestedTypes: [],
    associatedTypes: [],
    protocolRequirements: [],
    genericParameters: [],
    genericConstraints: [],
    attributes: [],
    location: { file: '<unknown>', line: 0, column: 0 },
    isPhantom: false,
    ...init,
  };
}
