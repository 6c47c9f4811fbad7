/**
 * Manifest Schema
 *
 * Zod schemas for the provisioning manifest: an inventory of targets and one
 * workflow per role.
 */

import { z } from 'zod';
import { ACTION_CATALOG, isCatalogAction, isQueryAction } from '../executor/catalog.js';
import { PostConditionKind, SideEffect, roleSchema, targetSchema } from '../types/index.js';

const sideEffectSchema = z.enum([SideEffect.MUTATING, SideEffect.QUERY]);

export const budgetSchema = z.object({
  maxAttempts: z.number().int().min(1).max(1000),
  delayMs: z.number().int().min(0).max(600000),
});

const paramsSchema = z.record(z.unknown());

const probeActionSchema = z
  .string()
  .min(1)
  .refine(isQueryAction, (action) => ({
    message: `probe '${action}' must be a catalog query action`,
  }));

/**
 * A probe given either by name or with parameters.
 */
export const probeSchema = z.union([
  probeActionSchema.transform((action) => ({ action, params: {} })),
  z.object({
    action: probeActionSchema,
    params: paramsSchema.default({}),
  }),
]);

export const postConditionSchema = z.object({
  kind: z.enum([PostConditionKind.REBOOT_IF_FLAGGED, PostConditionKind.WAIT_UNTIL_READY]),
  probe: probeSchema.optional(),
  budget: budgetSchema.optional(),
});

export const stepSchema = z
  .object({
    label: z.string().min(1),
    action: z.string().min(1),
    params: paramsSchema.optional(),
    sideEffect: sideEffectSchema.optional(),
    retrySafe: z.boolean().optional(),
    critical: z.boolean().optional(),
    retry: budgetSchema.optional(),
    when: z
      .object({
        step: z.string().min(1),
        is: z.enum(['success', 'failed', 'changed', 'unchanged']),
      })
      .optional(),
    /** One independent step per item */
    loop: z.array(paramsSchema).min(1).optional(),
  })
  .superRefine((step, ctx) => {
    if (step.sideEffect === undefined && !isCatalogAction(step.action)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sideEffect'],
        message: `action '${step.action}' is not in the catalog; declare its sideEffect`,
      });
    }
    const sideEffect = step.sideEffect ?? ACTION_CATALOG[step.action];
    const retrySafe = step.retrySafe ?? sideEffect === SideEffect.QUERY;
    if (step.retry && !retrySafe) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry'],
        message: 'retry is only allowed on retry-safe actions',
      });
    }
  });

export const stageSchema = z.object({
  name: z.string().min(1),
  steps: z.array(stepSchema).default([]),
  postCondition: postConditionSchema.optional(),
});

export const workflowSchema = z
  .object({
    role: roleSchema,
    required: z.boolean().default(true),
    dependsOn: z
      .array(
        z.object({
          role: roleSchema,
          checkpoint: z.string().min(1).optional(),
        })
      )
      .default([]),
    stages: z.array(stageSchema).min(1),
  })
  .superRefine((workflow, ctx) => {
    const stageNames = new Set<string>();
    const labels = new Map<string, { looped: boolean }>();

    workflow.stages.forEach((stage, stageIndex) => {
      if (stageNames.has(stage.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stages', stageIndex, 'name'],
          message: `duplicate stage name '${stage.name}'`,
        });
      }
      stageNames.add(stage.name);

      stage.steps.forEach((step, stepIndex) => {
        const path = ['stages', stageIndex, 'steps', stepIndex];
        if (step.when) {
          const referenced = labels.get(step.when.step);
          if (!referenced || referenced.looped) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [...path, 'when', 'step'],
              message: `'${step.when.step}' is not an earlier single step of this workflow`,
            });
          }
        }
        if (labels.has(step.label)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, 'label'],
            message: `duplicate step label '${step.label}'`,
          });
        }
        labels.set(step.label, { looped: step.loop !== undefined });
      });
    });
  });

export const manifestSchema = z.object({
  inventory: z.array(targetSchema).default([]),
  workflows: z.array(workflowSchema).min(1),
});

export type ManifestInput = z.input<typeof manifestSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
export type StepDeclaration = z.infer<typeof stepSchema>;
export type WorkflowDeclaration = z.infer<typeof workflowSchema>;
