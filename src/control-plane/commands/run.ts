import { Command } from 'commander';
import { createRuntime } from '../runtime.js';
import { failedPipelines, succeeded } from '../../pipeline/report.js';
import {
  print,
  printError,
  formatError,
  formatFailure,
  formatJson,
  formatRunReport,
  formatSuccess,
  formatWarning,
} from '../formatter.js';

interface RunOptions {
  manifest: string;
  simulate?: boolean;
  json?: boolean;
}

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Provision every target in the manifest')
    .option('-m, --manifest <path>', 'Manifest file', 'provisionkit.yaml')
    .option('--simulate', 'Run against an in-process simulated fleet', false)
    .option('--json', 'Output the run report as JSON', false)
    .action(async (options: RunOptions) => {
      try {
        await executeRun(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the run command.
 */
async function executeRun(options: RunOptions): Promise<void> {
  const provisioner = await createRuntime({
    manifest: options.manifest,
    simulate: options.simulate ?? false,
  });

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals): void => {
    printError(formatWarning(`Received ${signal}, cancelling run...`));
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const report = await provisioner.runAll(controller.signal);

    if (options.json) {
      print(formatJson(report));
    } else {
      print(formatRunReport(report));
    }

    if (succeeded(report)) {
      if (!options.json) {
        print('');
        print(formatSuccess('All required pipelines completed'));
      }
      return;
    }

    const failures = failedPipelines(report).filter((pipeline) => pipeline.required);
    printError(formatError(`${failures.length} required pipeline(s) did not complete`));
    for (const pipeline of failures) {
      printError(`  ${formatFailure(pipeline)}`);
    }
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  }
}
