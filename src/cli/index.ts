#!/usr/bin/env node
import process from 'process';
import path from 'path';
import fs from 'fs/promises';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readDeclarationsFile } from '../input';
import { logger, config, flushLogs } from '../utils';
import {
  OUTPUT_FORMATS,
  OutputFormat,
  TYPE_FILTERS,
  parseDepth,
  parseMode,
  renderAnalysis,
  renderTypeList,
} from './commands';
import { TraversalMode } from '../graph/traversal/types';
import { TypeFilter } from '../graph/exporters/type-listing';

interface AnalyzeCommandOptions {
  focus?: string;
  depth: number;
  mode: TraversalMode;
  includeDescendants?: boolean;
  format: OutputFormat;
  output?: string;
  includePrivate?: boolean;
  verbose?: boolean;
}

interface ListTypesCommandOptions {
  type: TypeFilter;
  verbose?: boolean;
}

// Check for Unicode support and provide fallbacks
const getEmoji = (emoji: string, fallback: string): string => {
  const supportsUnicode =
    process.env.TERM !== 'dumb' &&
    (!process.env.CI || process.env.CI === 'false') &&
    process.platform !== 'win32';

  return supportsUnicode ? emoji : fallback;
};

async function failAndExit(message: string, error: unknown): Promise<never> {
  console.error(chalk.red(`\n${getEmoji('❌', '[ERROR]')} ${message}`));
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  await flushLogs();
  return process.exit(1);
}

const program = new Command();

program
  .name('type-graph')
  .description('Build and query a relationship graph of type declarations')
  .version('0.1.0');

// Analyze command
program
  .command('analyze')
  .description('Build the relationship graph from a declarations JSON file and export it')
  .argument('<input>', 'Path to the declarations JSON document')
  .option('--focus <type>', 'Only export the neighborhood of this type')
  .option('--depth <n>', 'Traversal budget around the focus type', parseDepth, config.traversal.defaultMaxDepth)
  .addOption(
    new Option('--mode <mode>', 'Which relationships the focus traversal follows')
      .argParser(parseMode)
      .default(TraversalMode.STANDARD)
  )
  .option('--include-descendants', 'In inheritanceOnly mode, also follow subtypes')
  .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('dot'))
  .option('-o, --output <file>', 'Write the export to a file instead of stdout')
  .option('--include-private', 'Include private types and members')
  .option('--verbose', 'Enable verbose logging')
  .action(async (input: string, options: AnalyzeCommandOptions) => {
    if (options.verbose) {
      logger.level = 'debug';
    }

    // Keep stdout for the export when it is not written to a file
    const report = options.output ? console.log : console.error;
    const spinner = ora('Reading declarations...').start();

    try {
      const declarations = readDeclarationsFile(path.resolve(input));
      spinner.text = `Analyzing ${declarations.length} declarations...`;

      const { output, result, focusFound } = renderAnalysis(declarations, options);
      spinner.succeed('Analysis completed');

      if (!focusFound) {
        report(chalk.yellow(`${getEmoji('⚠️', '[WARN]')}  Focus type not found: ${options.focus}`));
      }

      if (options.output) {
        await fs.writeFile(options.output, output, 'utf-8');
        report(chalk.green(`${getEmoji('✅', '[OK]')} ${options.format.toUpperCase()} written to ${options.output}`));
      } else {
        process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
      }

      await flushLogs();

      report(chalk.blue(`${getEmoji('📊', 'Graph:')} Nodes: ${result.stats.nodeCount} (${result.stats.phantomCount} external)`));
      report(chalk.blue(`${getEmoji('🔗', 'Edges:')} Relationships: ${result.stats.relationshipCount}`));
      if (options.verbose) {
        for (const [kind, count] of Object.entries(result.stats.relationshipsByKind)) {
          report(chalk.gray(`  ├─ ${kind}: ${count}`));
        }
      }
      report(chalk.blue(`${getEmoji('⏱️', 'Time:')}  Duration: ${(result.durationMs / 1000).toFixed(2)}s`));

      if (result.integrityWarnings.length > 0) {
        report(chalk.yellow(`\n${getEmoji('⚠️', '[WARN]')}  ${result.integrityWarnings.length} integrity warnings:`));
        result.integrityWarnings.slice(0, 10).forEach((warning, index) => {
          report(chalk.gray(`  ${index + 1}. ${warning.message}`));
        });
        if (result.integrityWarnings.length > 10) {
          report(chalk.gray(`  ... and ${result.integrityWarnings.length - 10} more`));
        }
      }
    } catch (error) {
      spinner.fail('Analysis failed');
      await failAndExit('Error during analysis:', error);
    }
  });

// List types command
program
  .command('list-types')
  .description('List the types in a declarations JSON file')
  .argument('<input>', 'Path to the declarations JSON document')
  .addOption(new Option('-t, --type <type>', 'Filter by kind').choices(TYPE_FILTERS).default('all'))
  .option('-v, --verbose', 'Show file, inheritance and conformance details')
  .action(async (input: string, options: ListTypesCommandOptions) => {
    try {
      const declarations = readDeclarationsFile(path.resolve(input));
      for (const line of renderTypeList(declarations, options.type, options.verbose ?? false)) {
        console.log(line);
      }
      await flushLogs();
    } catch (error) {
      await failAndExit('Could not list types:', error);
    }
  });

// Help and error handling
program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  console.error(chalk.red('\n💥 Unhandled promise rejection:'), reason);
  process.exit(1);
});

// Parse arguments and run
program.parseAsync().catch(error => failAndExit('Command failed:', error));
