#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { relative } from 'path';
import { PythonParser } from '../parser/python-parser.js';
import { SourceResolver } from '../parser/source-resolver.js';
import { lintFiles } from '../analysis/linter.js';
import { Report } from '../analysis/report.js';
import { renderReport } from '../renderer/text-report.js';
import type { ReportStyle } from '../renderer/text-report.js';
import type { FilterConfig } from '../types/filter.js';
import { createDefaultFilterConfig, createNoTestsFilterConfig } from '../types/filter.js';

interface CliOptions {
  exclude: string[];
  include: string[];
  tests: boolean;
  failOnWarning: boolean;
  verbose: boolean;
}

const program = new Command();

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

const consoleStyle: ReportStyle = {
  divider: chalk.gray,
  path: chalk.bold,
  header: chalk.cyan,
  error: chalk.red,
  warning: chalk.yellow,
  summary: chalk.bold,
};

function buildFilterConfig(options: CliOptions): FilterConfig {
  const filterConfig = options.tests ? createDefaultFilterConfig() : createNoTestsFilterConfig();
  filterConfig.excludePatterns = options.exclude;
  filterConfig.includePatterns = options.include;
  return filterConfig;
}

program
  .name('docfield-lint')
  .description('Check that Python docstrings document their signatures with Sphinx field lists')
  .version('0.1.0')
  .argument('[paths...]', 'Python files or directories to lint', ['.'])
  .option('--exclude <pattern>', 'Exclude files matching pattern (repeatable)', collect, [])
  .option('--include <pattern>', 'Include only files matching pattern (repeatable)', collect, [])
  .option('--no-tests', 'Exclude test_*.py, *_test.py, conftest.py and tests/ directories')
  .option('--fail-on-warning', 'Exit non-zero when warnings are reported', false)
  .option('-v, --verbose', 'Show detailed progress', false)
  .action(async (paths: string[], options: CliOptions) => {
    const verbose = options.verbose;
    const spinner = ora({ isSilent: !verbose });

    try {
      const filterConfig = buildFilterConfig(options);

      spinner.start('Initializing parser...');
      const parser = new PythonParser();
      await parser.initialize();
      spinner.succeed('Parser initialized');

      const report = new Report();
      for (const path of paths) {
        spinner.start(`Discovering Python files in ${path}...`);
        const resolver = new SourceResolver(path, filterConfig);
        const filePaths = await resolver.resolve();
        spinner.succeed(`Found ${filePaths.length} Python files in ${path}`);

        if (verbose) {
          for (const filePath of filePaths) {
            console.error(chalk.gray(`  ${relative(process.cwd(), filePath)}`));
          }
        }

        spinner.start('Checking docstrings...');
        report.merge(lintFiles(filePaths, parser));
        spinner.stop();
      }

      if (report.hasIssues()) {
        spinner.warn(`${report.errorCount} errors, ${report.warningCount} warnings`);
      } else {
        spinner.succeed('All docstrings match their signatures');
      }

      for (const line of renderReport(report, consoleStyle)) {
        console.log(line);
      }

      for (const unit of report.unanalyzable) {
        console.error(chalk.red(`Error: could not analyze ${unit.filePath}: ${unit.reason}`));
      }

      const failed =
        report.errorCount > 0 ||
        report.unanalyzable.length > 0 ||
        (options.failOnWarning && report.warningCount > 0);
      process.exitCode = failed ? 1 : 0;
    } catch (error) {
      spinner.fail('Lint failed');
      if (error instanceof Error) {
        console.error(chalk.red(`\nError: ${error.message}`));
        if (verbose) {
          console.error(chalk.gray(error.stack));
        }
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync();
