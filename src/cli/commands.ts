import { InvalidArgumentError } from 'commander';
import { Declaration, DeclarationKind } from '../models';
import { BuildResult, GraphBuilder } from '../graph/builder';
import { exportDot } from '../graph/exporters/dot-exporter';
import { exportJsonGraph } from '../graph/exporters/json-exporter';
import { TypeFilter, listTypes } from '../graph/exporters/type-listing';
import { TraversalMode, isTraversalMode } from '../graph/traversal/types';
import { ExternalTypeClassifier } from '../utils/external-type-classifier';

export type OutputFormat = 'dot' | 'json';

export const OUTPUT_FORMATS: OutputFormat[] = ['dot', 'json'];
export const TYPE_FILTERS: TypeFilter[] = ['all', ...Object.values(DeclarationKind)];

export interface AnalyzeOptions {
  focus?: string;
  depth?: number;
  mode?: TraversalMode;
  includeDescendants?: boolean;
  format?: OutputFormat;
  includePrivate?: boolean;
}

export interface AnalysisOutput {
  output: string;
  result: BuildResult;
  focusFound: boolean;
}

/**
 * Commander argument parser for --depth.
 */
export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(depth)) {
    throw new InvalidArgumentError('Depth must be a non-negative integer.');
  }
  return depth;
}

/**
 * Commander argument parser for --mode.
 */
export function parseMode(value: string): TraversalMode {
  if (!isTraversalMode(value)) {
    throw new InvalidArgumentError(`Allowed modes: ${Object.values(TraversalMode).join(', ')}.`);
  }
  return value;
}

export function renderAnalysis(
  declarations: Declaration[],
  options: AnalyzeOptions = {},
  classifier?: ExternalTypeClassifier
): AnalysisOutput {
  const result = new GraphBuilder({ classifier }).build(declarations);
  const focusFound = options.focus === undefined || result.graph.hasNode(options.focus);

  const focus = {
    focus: options.focus,
    depth: options.depth,
    mode: options.mode,
    includeDescendants: options.includeDescendants,
  };

  if ((options.format ?? 'dot') === 'json') {
    return {
      output: JSON.stringify(exportJsonGraph(result.graph, focus), null, 2),
      result,
      focusFound,
    };
  }

  const output = exportDot(result.graph, { ...focus, includePrivate: options.includePrivate });
  return { output, result, focusFound };
}

export function renderTypeList(declarations: Declaration[], type: TypeFilter, verbose: boolean): string[] {
  const count = listTypes(declarations, { type }).length;
  if (count === 0) {
    return ['No types found.'];
  }
  return [`Found ${count} types:`, '', ...listTypes(declarations, { type, verbose })];
}
