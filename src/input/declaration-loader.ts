import * as fs from 'fs';
import { z } from 'zod';
import { AccessLevel, Declaration, DeclarationKind, RequirementKind } from '../models';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('declaration-loader');

export class DeclarationInputError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    public readonly source?: string
  ) {
    super(message);
    this.name = 'DeclarationInputError';
  }
}

const AccessLevelSchema = z.nativeEnum(AccessLevel).default(AccessLevel.INTERNAL);

const AttributeSchema = z.object({
  name: z.string().min(1),
  arguments: z.array(z.string()).default([]),
});

const ParameterSchema = z.object({
  label: z.string().optional(),
  name: z.string(),
  typeName: z.string(),
  defaultValue: z.string().optional(),
  isInout: z.boolean().default(false),
  isVariadic: z.boolean().default(false),
});

const PropertySchema = z.object({
  name: z.string().min(1),
  typeName: z.string(),
  accessLevel: AccessLevelSchema,
  isLet: z.boolean().default(false),
  isStatic: z.boolean().default(false),
  isLazy: z.boolean().default(false),
  isWeak: z.boolean().default(false),
  isUnowned: z.boolean().default(false),
  isComputed: z.boolean().default(false),
  defaultValue: z.string().optional(),
  attributes: z.array(AttributeSchema).default([]),
});

const MethodSchema = z.object({
  name: z.string().min(1),
  parameters: z.array(ParameterSchema).default([]),
  returnType: z.string().optional(),
  accessLevel: AccessLevelSchema,
  isStatic: z.boolean().default(false),
  isAsync: z.boolean().default(false),
  throws: z.boolean().default(false),
});

const InitializerSchema = z.object({
  parameters: z.array(ParameterSchema).default([]),
  accessLevel: AccessLevelSchema,
  isFailable: z.boolean().default(false),
  isAsync: z.boolean().default(false),
  throws: z.boolean().default(false),
});

const SubscriptSchema = z.object({
  parameters: z.array(ParameterSchema).default([]),
  returnType: z.string(),
  accessLevel: AccessLevelSchema,
  isStatic: z.boolean().default(false),
});

const TypeAliasSchema = z.object({
  name: z.string().min(1),
  aliasedType: z.string(),
  accessLevel: AccessLevelSchema,
});

const AssociatedTypeSchema = z.object({
  name: z.string().min(1),
  inheritedType: z.string().optional(),
  defaultType: z.string().optional(),
});

const ProtocolRequirementSchema = z.object({
  kind: z.nativeEnum(RequirementKind),
  name: z.string(),
  signature: z.string().default(''),
  isOptional: z.boolean().default(false),
});

const GenericParameterSchema = z.object({
  name: z.string().min(1),
  inheritedType: z.string().optional(),
});

const GenericConstraintSchema = z.object({
  type: z.string(),
  requirement: z.string(),
});

const SourceLocationSchema = z.object({
  file: z.string(),
  line: z.number().int().nonnegative(),
  column: z.number().int().nonnegative(),
});

export const DeclarationSchema: z.ZodType<Declaration, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    kind: z.nativeEnum(DeclarationKind),
    moduleName: z.string().optional(),
    accessLevel: AccessLevelSchema,
    inheritedTypes: z.array(z.string()).default([]),
    conformedProtocols: z.array(z.string()).default([]),
    properties: z.array(PropertySchema).default([]),
    methods: z.array(MethodSchema).default([]),
    initializers: z.array(InitializerSchema).default([]),
    subscripts: z.array(SubscriptSchema).default([]),
    typeAliases: z.array(TypeAliasSchema).default([]),
    nestedTypes: z.array(DeclarationSchema).default([]),
    associatedTypes: z.array(AssociatedTypeSchema).default([]),
    protocolRequirements: z.array(ProtocolRequirementSchema).default([]),
    genericParameters: z.array(GenericParameterSchema).default([]),
    genericConstraints: z.array(GenericConstraintSchema).default([]),
    attributes: z.array(AttributeSchema).default([]),
    location: SourceLocationSchema.default({ file: '<unknown>', line: 0, column: 0 }),
    isPhantom: z.boolean().default(false),
  })
);

function unwrapDocument(document: unknown): unknown {
  if (typeof document === 'object' && document !== null && !Array.isArray(document) && 'declarations' in document) {
    return document.declarations;
  }
  return document;
}

const DeclarationDocumentSchema = z.preprocess(unwrapDocument, z.array(DeclarationSchema));

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/**
 * Validate an already parsed declaration document: either an array of
 * declarations or an object with a `declarations` array.
 */
export function loadDeclarations(document: unknown, source?: string): Declaration[] {
  const parsed = DeclarationDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new DeclarationInputError(
      `Invalid declaration document${source ? ` in ${source}` : ''}: ${issues.slice(0, 3).join('; ')}`,
      issues,
      source
    );
  }

  logger.debug('Loaded declarations', { source, count: parsed.data.length });
  return parsed.data;
}

export function parseDeclarations(text: string, source?: string): Declaration[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new DeclarationInputError(`Declaration document is not valid JSON: ${errorMessage}`, [], source);
  }
  return loadDeclarations(document, source);
}

export function readDeclarationsFile(filePath: string): Declaration[] {
  if (!fs.existsSync(filePath)) {
    throw new DeclarationInputError(`Input file not found: ${filePath}`, [], filePath);
  }
  return parseDeclarations(fs.readFileSync(filePath, 'utf-8'), filePath);
}
