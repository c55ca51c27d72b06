#!/usr/bin/env node
import { Command } from 'commander';
import { runWithContext } from '../context.js';
import { AppError, toError } from '../errors.js';
import { logger } from '../logger.js';
import { collect, increaseVerbosity, selectMode, validateOptions, type CliOptions } from './options.js';
import { execute } from './run.js';

const program = new Command();

program
  .name('fleet-hygiene')
  .description('Find stale computers and unwanted policies on Jamf Pro, and optionally delete them')
  .version('1.0.0')
  .option('--computers', 'Report on computer check-in health')
  .option('--policies', 'Query or clean up policies')
  .option('--all', 'Process every object of the selected kind')
  .option('--search <query>', 'Policies whose name contains <query> (repeatable)', collect, [])
  .option('--category <name>', 'Policies in category <name> (repeatable)', collect, [])
  .option('--name <name>', 'Policy with exactly this name (repeatable)', collect, [])
  .option('--os <version>', 'Minimum acceptable OS version, e.g. 14.2')
  .option('--stale-days <days>', 'Days without check-in before a computer is stale')
  .option('--delete', 'Delete the matched policies')
  .option('--slack', 'Post a summary to the Slack webhook')
  .option('--save <path>', 'Save the run report JSON to a file')
  .option('--url <url>', 'Jamf Pro server URL')
  .option('--user <username>', 'API username')
  .option('--password <password>', 'API password')
  .option('--prefs <path>', 'JSON preferences file (JSS_URL, API_USERNAME, API_PASSWORD, SLACK_WEBHOOK)')
  .option('-v, --verbose', 'Verbose output; repeat for response headers', increaseVerbosity, 0)
  .action(async () => {
    const options = program.opts<CliOptions>();
    const reason = validateOptions(options);
    if (reason) {
      process.stderr.write(`syntax error: ${reason}\n`);
      process.exitCode = 1;
      return;
    }

    await runWithContext(() => execute(options, { color: process.stdout.isTTY ?? false }), selectMode(options));
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof AppError) {
    logger.error(err.message, err.toJSON());
  } else {
    logger.error('Fatal error', { error: toError(err).message });
  }
  process.exit(1);
});
