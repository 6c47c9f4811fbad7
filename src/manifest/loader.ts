/**
 * Manifest Loader
 *
 * Reads a YAML manifest, validates it and turns it into targets and role
 * workflows ready for the composer.
 *
 * @module manifest/loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import { ZodError } from 'zod';
import { defineAction } from '../executor/catalog.js';
import { createLogger } from '../utils/logger.js';
import {
  SideEffect,
  createTarget,
  type Action,
  type PostCondition,
  type RoleWorkflow,
  type Stage,
  type Step,
  type Target,
} from '../types/index.js';
import {
  manifestSchema,
  type StepDeclaration,
  type WorkflowDeclaration,
} from './schema.js';

const logger = createLogger('manifest-loader');

/**
 * Error thrown when a manifest file does not exist
 */
export class ManifestNotFoundError extends Error {
  constructor(public readonly manifestPath: string) {
    super(`Manifest not found: ${manifestPath}`);
    this.name = 'ManifestNotFoundError';
  }
}

/**
 * Error thrown when a manifest has invalid YAML syntax
 */
export class ManifestParseError extends Error {
  constructor(
    public readonly manifestPath: string,
    public readonly reason: Error
  ) {
    super(`Failed to parse YAML in ${manifestPath}: ${reason.message}`);
    this.name = 'ManifestParseError';
  }
}

/**
 * Error thrown when a manifest fails schema validation
 */
export class ManifestValidationError extends Error {
  constructor(
    public readonly manifestPath: string,
    public readonly zodError: ZodError
  ) {
    const issues = zodError.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    super(`Manifest validation failed for ${manifestPath}:\n${issues}`);
    this.name = 'ManifestValidationError';
  }
}

export interface LoadedManifest {
  source: string;
  targets: Target[];
  workflows: RoleWorkflow[];
}

/**
 * Loads and validates a manifest from disk
 *
 * @throws ManifestNotFoundError if the file doesn't exist
 * @throws ManifestParseError if the YAML is invalid
 * @throws ManifestValidationError if the manifest fails schema validation
 */
export async function loadManifest(manifestPath: string): Promise<LoadedManifest> {
  const resolved = path.resolve(process.cwd(), manifestPath);
  logger.debug({ manifestPath: resolved }, 'Loading manifest');

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ManifestNotFoundError(resolved);
    }
    throw err;
  }

  return parseManifest(content, resolved);
}

/**
 * Parses manifest text. `source` is only used in error messages.
 */
export function parseManifest(content: string, source = '<inline>'): LoadedManifest {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw new ManifestParseError(source, err instanceof Error ? err : new Error(String(err)));
  }

  const result = manifestSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ManifestValidationError(source, result.error);
  }

  const manifest = {
    source,
    targets: result.data.inventory.map(createTarget),
    workflows: result.data.workflows.map(toWorkflow),
  };

  logger.debug(
    {
      source,
      targets: manifest.targets.length,
      roles: manifest.workflows.map((workflow) => workflow.role),
    },
    'Manifest loaded'
  );

  return manifest;
}

function toWorkflow(declaration: WorkflowDeclaration): RoleWorkflow {
  return {
    role: declaration.role,
    required: declaration.required,
    dependsOn: declaration.dependsOn.map((dependency) => ({
      role: dependency.role,
      checkpoint: dependency.checkpoint ?? null,
    })),
    stages: declaration.stages.map(
      (stage): Stage => ({
        name: stage.name,
        steps: stage.steps.flatMap(expandStep),
        postCondition: stage.postCondition
          ? {
              kind: stage.postCondition.kind,
              probe: stage.postCondition.probe
                ? defineAction(stage.postCondition.probe.action, stage.postCondition.probe.params)
                : null,
              budget: stage.postCondition.budget ?? null,
            } satisfies PostCondition
          : null,
      })
    ),
  };
}

/**
 * A looped step becomes one independent step per item.
 */
export function expandStep(declaration: StepDeclaration): Step[] {
  const build = (label: string, params: Record<string, unknown>): Step => {
    const action: Action = defineAction(declaration.action, params, {
      ...(declaration.sideEffect !== undefined ? { sideEffect: declaration.sideEffect } : {}),
      ...(declaration.retrySafe !== undefined ? { retrySafe: declaration.retrySafe } : {}),
    });
    return {
      label,
      action,
      // Mutating steps halt the pipeline by default; queries are informational
      critical: declaration.critical ?? action.sideEffect === SideEffect.MUTATING,
      retry: declaration.retry ?? null,
      when: declaration.when ?? null,
    };
  };

  if (!declaration.loop) {
    return [build(declaration.label, declaration.params ?? {})];
  }

  return declaration.loop.map((item, index) => {
    const params = declaration.params ? renderItem(declaration.params, item) : { ...item };
    return build(`${declaration.label} [${itemLabel(item, index)}]`, params);
  });
}

const WHOLE_PLACEHOLDER = /^\{\{\s*item\.([A-Za-z0-9_]+)\s*\}\}$/;
const INLINE_PLACEHOLDER = /\{\{\s*item\.([A-Za-z0-9_]+)\s*\}\}/g;

/**
 * Substitute `{{ item.field }}` placeholders. A string that is exactly one
 * placeholder takes the item value as is (arrays stay arrays).
 */
export function renderItem(
  params: Record<string, unknown>,
  item: Record<string, unknown>
): Record<string, unknown> {
  const render = (value: unknown): unknown => {
    if (typeof value === 'string') {
      const whole = WHOLE_PLACEHOLDER.exec(value);
      if (whole?.[1] !== undefined) {
        return item[whole[1]];
      }
      return value.replace(INLINE_PLACEHOLDER, (_match, field: string) => {
        const replacement = item[field];
        return replacement === undefined ? '' : String(replacement);
      });
    }
    if (Array.isArray(value)) {
      return value.map(render);
    }
    if (value !== null && typeof value === 'object') {
      return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, render(inner)]));
    }
    return value;
  };

  return Object.fromEntries(Object.entries(params).map(([key, value]) => [key, render(value)]));
}

function itemLabel(item: Record<string, unknown>, index: number): string {
  for (const key of ['name', 'username', 'key', 'id']) {
    const value = item[key];
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return String(index + 1);
}
