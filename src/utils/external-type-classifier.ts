/**
 * Configuration-driven classifier for externally defined type names
 *
 * Guesses the kind (class, struct, protocol) and owning module of a name that was
 * referenced but never declared, and knows the ancestry of well-known framework
 * base classes. Rules are loaded from config/external-types/ (one file per
 * framework family) and applied with priority-based resolution, so the guessing
 * can be replaced without touching the graph algorithms.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config } from './config';
import { createComponentLogger } from './logger';
import { resolveProjectPath } from './project-root';

const logger = createComponentLogger('external-type-classifier');

/**
 * Priority System:
 * - 100: Exact names (always win)
 * - 20-50: Suffix rules (naming conventions such as "Delegate")
 * - 10-20: Prefix rules (framework prefixes such as "UI")
 *
 * Higher numbers win in conflicts.
 */
const EXACT_NAME_PRIORITY = 100;

const PresumedKindSchema = z.enum(['class', 'struct', 'protocol']);

const NamePatternRuleSchema = z.object({
  pattern: z.string().min(1),
  kind: PresumedKindSchema,
  priority: z.number(),
  description: z.string().optional(),
});

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

// Prefix patterns are regular expressions; compile them at load time
const PrefixRuleSchema = NamePatternRuleSchema.extend({
  pattern: z.string().min(1).refine(isValidPattern, { message: 'Invalid regular expression' }),
});

const FamilyRulesSchema = z.object({
  module: z.string().min(1).optional(),
  exactNames: z.record(PresumedKindSchema).default({}),
  namePatterns: z
    .object({
      prefix: z.array(PrefixRuleSchema).default([]),
      suffix: z.array(NamePatternRuleSchema).default([]),
    })
    .default({}),
  baseChains: z.record(z.array(z.string().min(1))).default({}),
});

const RulesFileSchema = z.record(FamilyRulesSchema);

export type PresumedKind = z.infer<typeof PresumedKindSchema>;
type FamilyRules = z.infer<typeof FamilyRulesSchema>;
type ClassificationRules = Record<string, FamilyRules>;

export interface ExternalClassification {
  kind: PresumedKind;
  moduleName: string | null;
  matchedRule: string;
}

interface RuleMatch {
  rule: string;
  kind: PresumedKind;
  priority: number;
  moduleName?: string;
}

export class ClassificationRulesError extends Error {
  constructor(
    message: string,
    public readonly file?: string
  ) {
    super(message);
    this.name = 'ClassificationRulesError';
  }
}

export class ExternalTypeClassifier {
  private rules: ClassificationRules;
  private compiledPrefixes = new Map<string, RegExp>();

  constructor(rulesPath?: string) {
    this.rules = this.loadRules(rulesPath);
  }

  /**
   * Load and validate every JSON rule file in the directory.
   * A framework family may only be defined once across all files.
   */
  private loadRules(rulesPath?: string): ClassificationRules {
    const directoryPath =
      rulesPath ?? config.classification.rulesPath ?? resolveProjectPath('config', 'external-types');

    if (!fs.existsSync(directoryPath)) {
      throw new ClassificationRulesError(`Classification rules directory not found: ${directoryPath}`);
    }

    const files = fs
      .readdirSync(directoryPath)
      .filter(f => f.endsWith('.json'))
      .sort();

    if (files.length === 0) {
      throw new ClassificationRulesError(`No JSON files found in ${directoryPath}`);
    }

    const mergedRules: ClassificationRules = {};

    for (const file of files) {
      const filePath = path.join(directoryPath, file);
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to read rules from ${file}: ${errorMessage}`);
        throw new ClassificationRulesError(`Could not read classification rules: ${errorMessage}`, file);
      }

      const parsed = RulesFileSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          .join('; ');
        throw new ClassificationRulesError(`Invalid rule format in ${file}: ${issues}`, file);
      }

      for (const family of Object.keys(parsed.data)) {
        if (mergedRules[family]) {
          throw new ClassificationRulesError(
            `Duplicate family "${family}" found in ${file}. Family already defined in another file.`,
            file
          );
        }
      }

      Object.assign(mergedRules, parsed.data);
      logger.debug(`Loaded rules from ${file}`);
    }

    logger.debug(`Loaded external type rules from ${files.length} files in ${directoryPath}`);
    return mergedRules;
  }

  /**
   * Presumed kind and module of a name that has no declaration of its own.
   */
  classifyExternal(name: string): ExternalClassification {
    const matches: RuleMatch[] = [];

    for (const [family, rules] of Object.entries(this.rules)) {
      const exactKind = rules.exactNames[name];
      if (exactKind) {
        matches.push({
          rule: `exact: ${family}.${name}`,
          kind: exactKind,
          priority: EXACT_NAME_PRIORITY,
          moduleName: rules.module,
        });
      }

      for (const rule of rules.namePatterns.suffix) {
        if (name.length > rule.pattern.length && name.endsWith(rule.pattern)) {
          matches.push({
            rule: `name suffix: ${rule.pattern}`,
            kind: rule.kind,
            priority: rule.priority,
            moduleName: rules.module,
          });
        }
      }

      for (const rule of rules.namePatterns.prefix) {
        if (this.prefixRegex(rule.pattern).test(name)) {
          matches.push({
            rule: `name prefix: ${rule.pattern}`,
            kind: rule.kind,
            priority: rule.priority,
            moduleName: rules.module,
          });
        }
      }
    }

    if (matches.length === 0) {
      // Fallback: type names are conventionally capitalized classes
      const isCapitalized = /^[A-Z]/.test(name);
      return {
        kind: isCapitalized ? 'class' : 'struct',
        moduleName: null,
        matchedRule: 'fallback (no matching rules)',
      };
    }

    matches.sort((a, b) => b.priority - a.priority);
    const winner = matches[0];
    const moduleMatch = matches.find(match => match.moduleName !== undefined);

    return {
      kind: winner.kind,
      moduleName: moduleMatch?.moduleName ?? null,
      matchedRule: winner.rule,
    };
  }

  /**
   * Ancestors of a well-known framework class, nearest first. Empty when unknown.
   */
  knownBaseChain(name: string): string[] {
    for (const rules of Object.values(this.rules)) {
      const chain = rules.baseChains[name];
      if (chain) {
        return [...chain];
      }
    }
    return [];
  }

  isProtocolLike(name: string): boolean {
    return this.classifyExternal(name).kind === 'protocol';
  }

  getSupportedFamilies(): string[] {
    return Object.keys(this.rules);
  }

  /**
   * Reload rules from disk (useful for development/testing)
   */
  reloadRules(rulesPath?: string): void {
    this.rules = this.loadRules(rulesPath);
    this.compiledPrefixes.clear();
    logger.info('External type rules reloaded');
  }

  private prefixRegex(pattern: string): RegExp {
    let regex = this.compiledPrefixes.get(pattern);
    if (!regex) {
      regex = new RegExp(pattern);
      this.compiledPrefixes.set(pattern, regex);
    }
    return regex;
  }
}

let defaultClassifier: ExternalTypeClassifier | null = null;

/**
 * Shared classifier over the bundled (or configured) rules, created on first use.
 */
export function getDefaultClassifier(): ExternalTypeClassifier {
  if (!defaultClassifier) {
    defaultClassifier = new ExternalTypeClassifier();
  }
  return defaultClassifier;
}
