import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type { TargetRegistry } from '../registry/target-registry.js';
import {
  ActionOutcome,
  CredentialUnavailableError,
  ErrorKind,
  ProviderConnectionError,
  SideEffect,
  TargetStatus,
  type Action,
  type ActionResult,
  type Target,
} from '../types/index.js';
import type { CredentialStore } from './credential-store.js';
import type { ProviderResponse, RemoteActionProvider, ResolvedCredentials } from './provider.js';

/**
 * Invokes named actions against targets and turns what the provider reports
 * into an ActionResult. Never throws for action-level failures.
 */
export class ActionExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly registry: TargetRegistry,
    private readonly provider: RemoteActionProvider,
    private readonly credentials: CredentialStore
  ) {
    this.logger = createLogger('action-executor');
  }

  async invoke(target: Target, action: Action, signal?: AbortSignal): Promise<ActionResult> {
    const startTime = Date.now();
    const finish = (
      outcome: ActionOutcome,
      diagnostic: string,
      requiresReboot: boolean,
      errorKind: ErrorKind | null
    ): ActionResult => {
      const result: ActionResult = {
        target: target.name,
        action: action.name,
        outcome,
        diagnostic,
        requiresReboot,
        errorKind,
        durationMs: Date.now() - startTime,
      };
      this.recordStatus(result);
      return result;
    };

    if (signal?.aborted) {
      return finish(ActionOutcome.FAILED, 'cancelled before start', false, ErrorKind.CANCELLED);
    }

    let credentials: ResolvedCredentials;
    try {
      credentials = await this.credentials.resolve(target.credentialRef);
    } catch (error) {
      if (error instanceof CredentialUnavailableError) {
        this.logger.error(
          { target: target.name, action: action.name, credentialRef: target.credentialRef },
          'Credential unavailable'
        );
        return finish(ActionOutcome.FAILED, error.message, false, ErrorKind.CREDENTIAL_UNAVAILABLE);
      }
      throw error;
    }

    let response: ProviderResponse;
    try {
      response = await this.provider.execute({
        target: {
          name: target.name,
          address: target.address,
          vars: target.vars,
          credentials,
        },
        action,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        return finish(ActionOutcome.FAILED, 'cancelled', false, ErrorKind.CANCELLED);
      }
      if (error instanceof ProviderConnectionError) {
        this.logger.warn({ target: target.name, action: action.name, err: error.message }, 'Target unreachable');
        return finish(ActionOutcome.UNREACHABLE, error.message, false, ErrorKind.UNREACHABLE);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ target: target.name, action: action.name, err: message }, 'Provider error');
      return finish(ActionOutcome.FAILED, message, false, ErrorKind.ACTION_FAILED);
    }

    if (!response.success) {
      const kind = signal?.aborted ? ErrorKind.CANCELLED : ErrorKind.ACTION_FAILED;
      this.logger.warn(
        { target: target.name, action: action.name, diagnostic: response.diagnostic },
        'Action failed'
      );
      return finish(ActionOutcome.FAILED, response.diagnostic, response.rebootRequired, kind);
    }

    // A query cannot change state, whatever the remote side claims
    const changed = response.changed && action.sideEffect === SideEffect.MUTATING;
    const outcome = changed ? ActionOutcome.CHANGED : ActionOutcome.UNCHANGED;

    this.logger.info(
      { target: target.name, action: action.name, outcome, rebootRequired: response.rebootRequired },
      'Action completed'
    );

    return finish(outcome, response.diagnostic, response.rebootRequired, null);
  }

  private recordStatus(result: ActionResult): void {
    switch (result.outcome) {
      case ActionOutcome.UNREACHABLE:
        this.registry.updateStatus(result.target, TargetStatus.UNREACHABLE);
        break;
      case ActionOutcome.CHANGED:
      case ActionOutcome.UNCHANGED:
        this.registry.updateStatus(result.target, TargetStatus.READY);
        break;
      case ActionOutcome.FAILED:
        // An action failure says nothing about reachability
        break;
    }
  }
}
