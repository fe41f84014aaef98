/**
 * installer-integrity CLI - Check an installer against its last release
 *
 * Commands:
 * - check: Reconcile manifests, libraries and built files; write the report
 * - codes: List the diagnostic codes
 * - make-id: Print a deterministic WiX identifier
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { checkCommand, codesCommand, makeIdCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './utils/logger.js';
import { ENV_BUILD_TYPE, ENV_INSTALLER_DIR, ENV_PROJECT_ROOT } from './config/environment.js';
import { formatError } from './diagnostics/errors.js';

const VERSION = '0.1.0';

/**
 * Options of the check command as commander parses them
 */
interface CheckCliOptions {
  installerDir?: string;
  projectRoot?: string;
  buildType?: string;
  config?: string;
  report?: string;
  concurrency?: number;
  skipUntracked?: boolean;
  fail: boolean;
  silent?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('installer-integrity')
  .description('Check that an installer can still be patched from its last release')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * check command - Reconcile and write the report
 */
program
  .command('check')
  .description('Compare manifests and built files with the released libraries')
  .addOption(
    new Option('--installer-dir <path>', 'Directory holding the .wxs sources and libraries')
      .env(ENV_INSTALLER_DIR)
  )
  .addOption(
    new Option('--project-root <path>', 'Root that library paths are relative to')
      .env(ENV_PROJECT_ROOT)
  )
  .addOption(
    new Option('--build-type <name>', 'Build flavor substituted for ${config}')
      .env(ENV_BUILD_TYPE)
  )
  .option('--config <file>', 'Configuration file (XML or YAML)')
  .option('--report <file>', 'Report file, relative to the installer directory')
  .addOption(
    new Option('--concurrency <n>', 'Files checked at once')
      .argParser(parsePositiveInt)
  )
  .option('--skip-untracked', 'Skip the DistFiles source control check')
  .option('--no-fail', 'Exit 0 even when errors are found')
  .option('--silent', 'Write the report without printing it')
  .action(async (cmdOpts: CheckCliOptions) => {
    const globalOpts = program.opts<GlobalOptions>();
    const ctx = createContext(globalOpts);

    try {
      const result = await checkCommand(ctx, {
        installerDir: cmdOpts.installerDir,
        projectRoot: cmdOpts.projectRoot,
        buildType: cmdOpts.buildType,
        config: cmdOpts.config,
        report: cmdOpts.report,
        concurrency: cmdOpts.concurrency,
        skipUntracked: cmdOpts.skipUntracked,
        fail: cmdOpts.fail,
        silent: cmdOpts.silent,
      });
      if (ctx.outputFormat === 'json') {
        printResult(result);
      }
      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(formatError(err));
      process.exit(1);
    }
  });

/**
 * codes command - List diagnostic codes
 */
program
  .command('codes')
  .description('List the error and warning codes the check can report')
  .action(async () => {
    const ctx = createContext(program.opts<GlobalOptions>());
    const result = await codesCommand(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result);
    }
  });

/**
 * make-id command - Deterministic identifier
 */
program
  .command('make-id')
  .description('Print the identifier generated for a name and seed')
  .argument('<name>', 'Readable part of the identifier')
  .argument('<seed>', 'Value hashed into the identifier (usually a component id)')
  .action(async (name: string, seed: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    const result = await makeIdCommand(ctx, { name, seed });
    if (ctx.outputFormat === 'json') {
      printResult(result);
    }
  });

// Parse and execute
program.parseAsync().catch((err: unknown) => {
  error(formatError(err));
  process.exit(1);
});
