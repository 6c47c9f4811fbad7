import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createPlanCommand } from './commands/plan.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('provisionkit')
    .description('provisionkit - Sequenced, idempotent provisioning for multi-node domain labs')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRunCommand());
  program.addCommand(createPlanCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createRunCommand } from './commands/run.js';
export { createPlanCommand } from './commands/plan.js';
