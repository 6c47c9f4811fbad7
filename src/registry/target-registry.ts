import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import {
  DuplicateTargetError,
  UnknownTargetError,
  type Role,
  type Target,
  type TargetStatus,
} from '../types/index.js';

/**
 * Holds declared targets and their last known status.
 *
 * The only state shared across pipelines. Each target belongs to exactly one
 * pipeline, so status updates have a single writer per entry. Callers only
 * ever see copies; status changes go through `updateStatus`.
 */
export class TargetRegistry {
  private readonly logger: Logger;
  private readonly targets = new Map<string, Target>();

  constructor(targets: Iterable<Target> = []) {
    this.logger = createLogger('target-registry');
    for (const target of targets) {
      this.register(target);
    }
  }

  get size(): number {
    return this.targets.size;
  }

  register(target: Target): void {
    if (this.targets.has(target.name)) {
      throw new DuplicateTargetError(target.name);
    }
    this.targets.set(target.name, snapshot(target));
    this.logger.debug({ target: target.name, role: target.role }, 'Target registered');
  }

  /**
   * Targets of a role in declaration order.
   */
  byRole(role: Role): Target[] {
    return this.all().filter((target) => target.role === role);
  }

  get(name: string): Target {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    return snapshot(target);
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  all(): Target[] {
    return [...this.targets.values()].map(snapshot);
  }

  updateStatus(name: string, status: TargetStatus): void {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    if (target.status === status) {
      return;
    }
    this.logger.debug({ target: name, from: target.status, to: status }, 'Target status changed');
    target.status = status;
  }
}

function snapshot(target: Target): Target {
  return { ...target, vars: { ...target.vars } };
}
