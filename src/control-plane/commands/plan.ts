import { Command } from 'commander';
import { createRuntime } from '../runtime.js';
import { print, printError, formatError, formatJson, formatPlan } from '../formatter.js';

interface PlanOptions {
  manifest: string;
  json?: boolean;
}

/**
 * Create the plan command.
 */
export function createPlanCommand(): Command {
  const command = new Command('plan')
    .description('Validate the manifest and show the execution order')
    .option('-m, --manifest <path>', 'Manifest file', 'provisionkit.yaml')
    .option('--json', 'Output the plan as JSON', false)
    .action(async (options: PlanOptions) => {
      try {
        await executePlan(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executePlan(options: PlanOptions): Promise<void> {
  // Planning never contacts a target, so the simulated wiring is enough
  const provisioner = await createRuntime({ manifest: options.manifest, simulate: true });
  const { plan, pipelines } = provisioner.plan();

  if (options.json) {
    print(
      formatJson({
        order: plan.order,
        dependencies: plan.dependencies,
        pipelines: pipelines.map((pipeline) => ({
          id: pipeline.id,
          role: pipeline.role,
          target: pipeline.target.name,
          address: pipeline.target.address,
          required: pipeline.required,
          stages: pipeline.stages.map((stage) => stage.name),
        })),
      })
    );
    return;
  }

  print(formatPlan(plan, pipelines));
}
