/**
 * Type-expression decomposition.
 *
 * Turns raw type strings as written in declarations (`User?`, `[Post]`,
 * `[String: Tag]`, `Result<User, Error>`, `(User, Int) async throws -> Post`)
 * into a normalized shape. Every function here is pure and fail-soft: input
 * that cannot be read degrades to the fallback type instead of throwing.
 */

export const FALLBACK_TYPE = 'Any';

export interface TypeShape {
  base: string;
  isOptional: boolean;
  isArray: boolean;
  isDictionary: boolean;
  isClosure: boolean;
  genericArgs: string[];
}

export interface ClosureShape {
  parameters: string[];
  returnType: string | null;
}

const BUILTIN_TYPES: ReadonlySet<string> = new Set([
  // numeric
  'Int', 'Int8', 'Int16', 'Int32', 'Int64', 'UInt', 'UInt8', 'UInt16', 'UInt32', 'UInt64',
  'Double', 'Float', 'Float80', 'CGFloat', 'Decimal', 'NSNumber',
  // text
  'String', 'Substring', 'Character', 'NSString',
  // boolean, time and identity
  'Bool', 'Date', 'TimeInterval', 'UUID', 'URL', 'Data',
  // collection literals and wrappers
  'Array', 'Dictionary', 'Set', 'Optional', 'Result', 'ContiguousArray', 'ArraySlice',
  // top and bottom types
  'Any', 'AnyObject', 'Void', 'Never', 'Self', 'Error',
]);

const LEADING_ATTRIBUTE = /^@\w+(\([^)]*\))?\s*/;
const LEADING_KEYWORD = /^(inout|some|any|borrowing|consuming|__owned|__shared)\s+/;
const TRAILING_EFFECTS = /\s+(async|throws|rethrows)(\s+(async|throws|rethrows))*\s*$/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const METATYPE_SUFFIX = /\.(Type|Protocol)$/;
const VOID_RETURNS: ReadonlySet<string> = new Set(['', 'Void', '()']);

function fallbackShape(): TypeShape {
  return {
    base: FALLBACK_TYPE,
    isOptional: false,
    isArray: false,
    isDictionary: false,
    isClosure: false,
    genericArgs: [],
  };
}

/**
 * Split on a separator that sits outside every `<>`, `()` and `[]` pair.
 * The `>` of an arrow (`->`) is not a closing bracket.
 */
export function splitTopLevel(text: string, separator: string = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === '-' && text[i + 1] === '>') {
      current += '->';
      i++;
      continue;
    }

    if (ch === '<' || ch === '(' || ch === '[') {
      depth++;
    } else if (ch === '>' || ch === ')' || ch === ']') {
      depth = Math.max(0, depth - 1);
    } else if (ch === separator && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }

    current += ch;
  }

  parts.push(current.trim());
  return parts.filter(part => part.length > 0);
}

/**
 * Index of the first `->` outside any bracket pair, or -1.
 */
export function findTopLevelArrow(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '-' && text[i + 1] === '>') {
      if (depth === 0) return i;
      i++;
    } else if (ch === '<' || ch === '(' || ch === '[') {
      depth++;
    } else if (ch === '>' || ch === ')' || ch === ']') {
      depth = Math.max(0, depth - 1);
    }
  }
  return -1;
}

function findTopLevelChar(text: string, target: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === target && depth === 0) {
      return i;
    }
    if (ch === '-' && text[i + 1] === '>') {
      i++;
    } else if (ch === '<' || ch === '(' || ch === '[') {
      depth++;
    } else if (ch === '>' || ch === ')' || ch === ']') {
      depth = Math.max(0, depth - 1);
    }
  }
  return -1;
}

/**
 * Index of the bracket closing the one opened at `openIndex`, or -1.
 */
function findMatchingClose(text: string, openIndex: number): number {
  const open = text[openIndex];
  const close = open === '(' ? ')' : open === '[' ? ']' : '>';
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (ch === '-' && text[i + 1] === '>') {
      i++;
      continue;
    }
    if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function isWrappedBy(text: string, open: string): boolean {
  return text.startsWith(open) && findMatchingClose(text, 0) === text.length - 1;
}

function normalize(raw: string): string {
  let text = raw.trim();
  let previous: string;
  do {
    previous = text;
    text = text.replace(LEADING_ATTRIBUTE, '').replace(LEADING_KEYWORD, '').trim();
  } while (text !== previous);
  return text;
}

/**
 * Reduce a possibly qualified or metatype name to its last component:
 * `Foundation.URL` becomes `URL`, `User.Type` becomes `User`.
 */
export function stripQualification(name: string): string {
  const unwrapped = name.trim().replace(METATYPE_SUFFIX, '');
  const lastDot = unwrapped.lastIndexOf('.');
  return lastDot === -1 ? unwrapped : unwrapped.substring(lastDot + 1);
}

export function decompose(raw: string): TypeShape {
  const text = normalize(raw);
  if (!text) return fallbackShape();

  // Optional and implicitly unwrapped optional: strip one level and recurse
  if (text.endsWith('?') || text.endsWith('!')) {
    const inner = decompose(text.slice(0, -1));
    return { ...inner, isOptional: true };
  }

  if (text.endsWith('...')) {
    const inner = decompose(text.slice(0, -3));
    return { ...inner, isArray: true };
  }

  if (findTopLevelArrow(text) !== -1) {
    return { ...fallbackShape(), isClosure: true };
  }

  if (METATYPE_SUFFIX.test(text)) {
    return decompose(text.replace(METATYPE_SUFFIX, ''));
  }

  if (isWrappedBy(text, '(')) {
    const components = splitTopLevel(text.slice(1, -1));
    if (components.length === 1) {
      return decompose(components[0]);
    }
    // Tuples keep their components for deeper analysis
    return { ...fallbackShape(), genericArgs: components };
  }

  if (isWrappedBy(text, '[')) {
    const inner = text.slice(1, -1).trim();
    const colon = findTopLevelChar(inner, ':');
    if (colon !== -1) {
      const key = inner.substring(0, colon).trim();
      const value = inner.substring(colon + 1).trim();
      if (!key || !value) return fallbackShape();
      return {
        ...fallbackShape(),
        base: 'Dictionary',
        isDictionary: true,
        genericArgs: [key, value],
      };
    }
    const element = decompose(inner);
    return { ...element, isArray: true };
  }

  const genericStart = findTopLevelChar(text, '<');
  if (genericStart !== -1) {
    if (findMatchingClose(text, genericStart) !== text.length - 1) {
      return fallbackShape();
    }
    const base = stripQualification(text.substring(0, genericStart));
    const args = splitTopLevel(text.substring(genericStart + 1, text.length - 1));
    if (!IDENTIFIER.test(base)) return fallbackShape();

    if (base === 'Optional' && args.length === 1) {
      return { ...decompose(args[0]), isOptional: true };
    }

    return { ...fallbackShape(), base, genericArgs: args };
  }

  const base = stripQualification(text);
  if (!IDENTIFIER.test(base)) return fallbackShape();

  return { ...fallbackShape(), base };
}

function stripParameterLabel(parameter: string): string {
  const colon = findTopLevelChar(parameter, ':');
  if (colon === -1) return parameter;
  const label = parameter.substring(0, colon).trim();
  // "_ value: Int" or "value: Int"; anything else is not a label
  return /^[A-Za-z_][A-Za-z0-9_]*(\s+[A-Za-z_][A-Za-z0-9_]*)?$/.test(label)
    ? parameter.substring(colon + 1).trim()
    : parameter;
}

/**
 * Split a closure type into parameter types and return type.
 * Returns null when the expression is not a closure.
 */
export function decomposeClosure(raw: string): ClosureShape | null {
  let text = normalize(raw);

  // Peel optional markers and wrapping parentheses: `((User) -> Void)?`
  for (;;) {
    if (text.endsWith('?') || text.endsWith('!')) {
      text = normalize(text.slice(0, -1));
    } else if (isWrappedBy(text, '(') && findTopLevelArrow(text) === -1) {
      text = normalize(text.slice(1, -1));
    } else {
      break;
    }
  }

  const arrow = findTopLevelArrow(text);
  if (arrow === -1) return null;

  const parameterText = text.substring(0, arrow).replace(TRAILING_EFFECTS, '').trim();
  const returnText = text.substring(arrow + 2).trim();

  const parameterList = isWrappedBy(parameterText, '(')
    ? parameterText.slice(1, -1)
    : parameterText;

  const parameters = splitTopLevel(parameterList)
    .map(stripParameterLabel)
    .map(normalize)
    .filter(parameter => !VOID_RETURNS.has(parameter));

  return {
    parameters,
    returnType: VOID_RETURNS.has(returnText) ? null : returnText,
  };
}

export function isBuiltinType(name: string): boolean {
  return BUILTIN_TYPES.has(name);
}

/**
 * Every base name mentioned anywhere inside a type expression, outermost first,
 * without duplicates. Builtins are included; callers filter as they need.
 */
export function referencedTypeNames(raw: string): string[] {
  const names: string[] = [];
  const seen = new Set<string>();
  const pending: string[] = [raw];

  while (pending.length > 0) {
    const current = pending.shift();
    if (current === undefined) break;

    const closure = decomposeClosure(current);
    if (closure) {
      pending.push(...closure.parameters);
      if (closure.returnType) pending.push(closure.returnType);
      continue;
    }

    const shape = decompose(current);
    if (shape.base !== FALLBACK_TYPE && !seen.has(shape.base)) {
      seen.add(shape.base);
      names.push(shape.base);
    }
    pending.push(...shape.genericArgs);
  }

  return names;
}
