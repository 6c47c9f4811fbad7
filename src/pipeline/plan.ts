import {
  CyclicDependencyError,
  UnknownCheckpointError,
  type Role,
  type RoleWorkflow,
} from '../types/index.js';

/**
 * A dependency edge with its checkpoint resolved to a stage name.
 * `checkpoint` is null only when the upstream workflow has no stages, in which
 * case the upstream pipeline's completion is the checkpoint.
 */
export interface ResolvedDependency {
  dependent: Role;
  upstream: Role;
  checkpoint: string | null;
}

export interface ExecutionPlan {
  /** Roles with every dependency before its dependents */
  order: Role[];
  workflows: ReadonlyMap<Role, RoleWorkflow>;
  dependencies: ResolvedDependency[];
}

/**
 * Validate the role graph and order it. Throws before anything executes.
 *
 * @throws UnknownCheckpointError for a dependency on an undeclared role or stage
 * @throws CyclicDependencyError if the graph is not acyclic
 */
export function planExecution(workflows: readonly RoleWorkflow[]): ExecutionPlan {
  const byRole = new Map<Role, RoleWorkflow>();
  for (const workflow of workflows) {
    if (byRole.has(workflow.role)) {
      throw new Error(`Duplicate workflow for role '${workflow.role}'`);
    }
    byRole.set(workflow.role, workflow);
  }

  const dependencies: ResolvedDependency[] = [];
  for (const workflow of workflows) {
    for (const dependency of workflow.dependsOn) {
      const upstream = byRole.get(dependency.role);
      if (!upstream) {
        throw new UnknownCheckpointError(workflow.role, dependency.role, null);
      }

      let checkpoint: string | null;
      if (dependency.checkpoint !== null) {
        const checkpointName = dependency.checkpoint;
        if (!upstream.stages.some((stage) => stage.name === checkpointName)) {
          throw new UnknownCheckpointError(workflow.role, dependency.role, checkpointName);
        }
        checkpoint = checkpointName;
      } else {
        checkpoint = upstream.stages[upstream.stages.length - 1]?.name ?? null;
      }

      dependencies.push({ dependent: workflow.role, upstream: dependency.role, checkpoint });
    }
  }

  return {
    order: topologicalOrder(workflows),
    workflows: byRole,
    dependencies,
  };
}

/**
 * Depth-first post-order over declared roles. Ties keep declaration order.
 */
function topologicalOrder(workflows: readonly RoleWorkflow[]): Role[] {
  const edges = new Map<Role, Role[]>(
    workflows.map((workflow) => [workflow.role, workflow.dependsOn.map((dep) => dep.role)])
  );
  const visited = new Set<Role>();
  const path: Role[] = [];
  const order: Role[] = [];

  const visit = (role: Role): void => {
    if (visited.has(role)) {
      return;
    }
    const onPath = path.indexOf(role);
    if (onPath !== -1) {
      throw new CyclicDependencyError([...path.slice(onPath), role]);
    }

    path.push(role);
    for (const upstream of edges.get(role) ?? []) {
      visit(upstream);
    }
    path.pop();

    visited.add(role);
    order.push(role);
  };

  for (const workflow of workflows) {
    visit(workflow.role);
  }

  return order;
}
