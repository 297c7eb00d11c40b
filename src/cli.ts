#!/usr/bin/env node
import { createRequire } from 'node:module';
import { program } from 'commander';
import ora from 'ora';
import { check } from './index.js';
import { formatTerminalReport } from './reporters/terminal.js';
import { formatAgentReport } from './reporters/agent.js';

interface CliOptions {
  verbose?: boolean;
  agent?: boolean;
  all?: boolean;
  sourceMaps: boolean;
}

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

program
  .name('lifetime-lint')
  .description('Reject JavaScript that uses platform APIs outside the lifetime they are available in')
  .version(pkg.version)
  .argument('[directory]', 'Directory to scan', '.')
  .option('--verbose', 'Show every issue grouped by file')
  .option('--agent', 'Output structured XML for LLM consumption')
  .option('--all', 'Report every violation instead of stopping at the first one per file')
  .option('--no-source-maps', 'Report positions in the scanned files even when source maps exist')
  .action(async (directory: string, options: CliOptions) => {
    const spinner = ora('Scanning...').start();

    try {
      const result = await check(directory, {
        reportAll: options.all,
        // commander defaults negatable flags to true; only an explicit --no-source-maps overrides config
        sourceMaps: options.sourceMaps ? undefined : false,
      });

      spinner.stop();

      const failed = result.diagnostics.length > 0 || result.parseFailures.length > 0;

      if (options.agent) {
        console.log(
          formatAgentReport(result.diagnostics, result.parseFailures, result.filesScanned)
        );
        process.exit(failed ? 1 : 0);
        return;
      }

      console.log(
        formatTerminalReport(
          result.diagnostics,
          result.parseFailures,
          result.filesScanned,
          options.verbose ?? false
        )
      );

      process.exit(failed ? 1 : 0);
    } catch (error) {
      spinner.fail(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
