import { z } from 'zod';

// Target Role
export const Role = {
  CONTROLLER: 'controller',
  MEMBER: 'member',
  DEPLOY: 'deploy',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const roleSchema = z.enum([Role.CONTROLLER, Role.MEMBER, Role.DEPLOY]);

// Target Status
export const TargetStatus = {
  UNKNOWN: 'unknown',
  UNREACHABLE: 'unreachable',
  READY: 'ready',
  FAILED: 'failed',
} as const;

export type TargetStatus = (typeof TargetStatus)[keyof typeof TargetStatus];

/**
 * Declared node. `credentialRef` is an opaque key for the credential store;
 * secrets never live on the target itself.
 */
export interface Target {
  name: string;
  role: Role;
  address: string;
  credentialRef: string;
  /** Connection parameters handed to the provider verbatim (port, transport, ...) */
  vars: Record<string, string>;
  status: TargetStatus;
}

export const targetSchema = z.object({
  name: z.string().min(1).regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'must be a host-like name'),
  role: roleSchema,
  address: z.string().min(1),
  credential: z.string().min(1),
  vars: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
});

export type TargetDeclaration = z.infer<typeof targetSchema>;

/**
 * Build a Target in its initial state from an inventory declaration.
 */
export function createTarget(declaration: TargetDeclaration): Target {
  return {
    name: declaration.name,
    role: declaration.role,
    address: declaration.address,
    credentialRef: declaration.credential,
    vars: { ...declaration.vars },
    status: TargetStatus.UNKNOWN,
  };
}
