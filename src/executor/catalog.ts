/**
 * Catalog of known idempotent operations and their side-effect class.
 */

import { SideEffect, type Action, type ActionParams } from '../types/index.js';

export const ACTION_CATALOG: Readonly<Record<string, SideEffect>> = {
  'set-local-user': SideEffect.MUTATING,
  'install-feature': SideEffect.MUTATING,
  'create-domain': SideEffect.MUTATING,
  'create-user': SideEffect.MUTATING,
  'join-domain': SideEffect.MUTATING,
  'set-dns': SideEffect.MUTATING,
  'set-registry': SideEffect.MUTATING,
  'download-file': SideEffect.MUTATING,
  'install-package': SideEffect.MUTATING,
  'remove-file': SideEffect.MUTATING,
  'ensure-service': SideEffect.MUTATING,
  reboot: SideEffect.MUTATING,
  ping: SideEffect.QUERY,
  'check-command': SideEffect.QUERY,
};

export const REBOOT_ACTION = 'reboot';

export function isCatalogAction(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(ACTION_CATALOG, name);
}

/**
 * Whether a catalog action only reads state, and so can serve as a readiness probe.
 */
export function isQueryAction(name: string): boolean {
  return isCatalogAction(name) && ACTION_CATALOG[name] === SideEffect.QUERY;
}

/**
 * Define an immutable action. Names outside the catalog need an explicit
 * side-effect class.
 */
export function defineAction(
  name: string,
  params: ActionParams = {},
  options: { sideEffect?: SideEffect; retrySafe?: boolean } = {}
): Action {
  const sideEffect = options.sideEffect ?? ACTION_CATALOG[name];
  if (sideEffect === undefined) {
    throw new Error(`Action '${name}' is not in the catalog and declares no side effect`);
  }

  return Object.freeze({
    name,
    params: Object.freeze({ ...params }),
    sideEffect,
    // Queries never change state, so repeating one is always safe
    retrySafe: options.retrySafe ?? sideEffect === SideEffect.QUERY,
  });
}
