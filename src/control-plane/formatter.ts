import {
  PipelineState,
  RunStatus,
  type PipelineFailure,
  type PipelineReport,
  type RolePipeline,
  type RunReport,
} from '../types/index.js';
import type { ExecutionPlan } from '../pipeline/plan.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function formatRunStatus(status: RunStatus): string {
  const statusColors: Record<RunStatus, keyof typeof colors> = {
    [RunStatus.COMPLETED]: 'green',
    [RunStatus.FAILED]: 'red',
    [RunStatus.CANCELLED]: 'gray',
  };
  return colorize(status.toUpperCase(), statusColors[status]);
}

/**
 * Format duration in seconds to human-readable string.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  value: (item: T) => string;
}

/**
 * Format data as a table. Cell values are plain text; the header is bold.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  lines.push(columns.map((col) => bold(col.header.padEnd(col.width))).join('  ').trimEnd());
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    const row = columns
      .map((col) => truncate(col.value(item), col.width).padEnd(col.width))
      .join('  ');
    lines.push(row.trimEnd());
  }

  return lines.join('\n');
}

/**
 * Where a failure happened, e.g. `domain > Create domain`.
 */
export function formatFailureLocation(failure: PipelineFailure): string {
  if (failure.stage === null) {
    return 'before start';
  }
  return failure.step === null ? failure.stage : `${failure.stage} > ${failure.step}`;
}

export function formatFailure(pipeline: PipelineReport): string {
  if (!pipeline.failure) {
    return `${pipeline.id}: ${pipeline.state}`;
  }
  const { failure } = pipeline;
  const optional = pipeline.required ? '' : ' (optional)';
  return `${pipeline.id}${optional} at ${formatFailureLocation(failure)}: [${failure.kind}] ${failure.diagnostic}`;
}

/**
 * Format a run report for the terminal.
 */
export function formatRunReport(report: RunReport): string {
  const seconds = Math.round((report.completedAt.getTime() - report.startedAt.getTime()) / 1000);
  const lines: string[] = [
    `${bold('Run')} ${report.runId}  ${formatRunStatus(report.status)}  ${dim(formatDuration(seconds))}`,
    '',
  ];

  if (report.pipelines.length === 0) {
    lines.push(dim('No pipelines were bound to targets.'));
    return lines.join('\n');
  }

  lines.push(
    formatTable([...report.pipelines], [
      { header: 'PIPELINE', width: 28, value: (p) => p.id },
      { header: 'STATE', width: 10, value: (p) => p.state.toUpperCase() },
      {
        header: 'STAGES',
        width: 6,
        value: (p) => String(p.stages.filter((stage) => stage.completedAt !== null).length),
      },
      {
        header: 'LAST STAGE',
        width: 24,
        value: (p) => p.stages[p.stages.length - 1]?.name ?? '-',
      },
    ])
  );

  const failed = report.pipelines.filter((p) => p.state !== PipelineState.COMPLETED);
  if (failed.length > 0) {
    lines.push('', bold('Failures:'));
    for (const pipeline of failed) {
      lines.push(`  ${red('✗')} ${formatFailure(pipeline)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format an execution plan: role order, dependencies and bound pipelines.
 */
export function formatPlan(plan: ExecutionPlan, pipelines: RolePipeline[]): string {
  const lines: string[] = [bold('Execution order:')];

  plan.order.forEach((role, index) => {
    const workflow = plan.workflows.get(role);
    const stages = workflow ? workflow.stages.map((stage) => stage.name).join(', ') : '';
    const required = workflow?.required === false ? ' (optional)' : '';
    lines.push(`  ${index + 1}. ${cyan(role)}${required}: ${stages}`);

    for (const dependency of plan.dependencies.filter((dep) => dep.dependent === role)) {
      lines.push(`       waits for ${dependency.upstream} @ ${dependency.checkpoint ?? 'completion'}`);
    }

    const bound = pipelines.filter((pipeline) => pipeline.role === role);
    if (bound.length === 0) {
      lines.push(dim('       no targets'));
    }
    for (const pipeline of bound) {
      lines.push(`       - ${pipeline.id} (${pipeline.target.address})`);
    }
  });

  return lines.join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${message}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${message}`;
}

/**
 * Format data as JSON.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output
  console.log(text);
}

/**
 * Print to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output
  console.error(text);
}
