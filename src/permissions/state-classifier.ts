/**
 * Permission state classification.
 *
 * Inherited bits are the part of the effective value that is not set
 * explicitly: `inherited = effective XOR explicit`. This holds because the
 * service guarantees the explicit value is a subset of the effective one.
 */

import type { AccessControlEntry, ActionDefinition } from "../types.js";

export type PermissionState = "Allow" | "Allow (inherited)" | "Deny" | "Deny (inherited)" | "Not set";

export type PermissionStateResult = {
  bit: number;
  name?: string;
  displayName?: string;
  state: PermissionState;
};

export type PermissionStateInput = {
  requested: number;
  allow: number;
  deny: number;
  effectiveAllow: number;
  effectiveDeny: number;
};

/**
 * Classify every catalogue action whose bit is in `requested`, in
 * catalogue order.
 */
export function classifyPermissionStates(
  actions: readonly ActionDefinition[],
  input: PermissionStateInput,
): PermissionStateResult[] {
  const inheritedAllow = input.effectiveAllow ^ input.allow;
  const inheritedDeny = input.effectiveDeny ^ input.deny;
  const results: PermissionStateResult[] = [];

  for (const action of actions) {
    const bit = action.bit ?? 0;
    if (bit === 0 || (input.requested & bit) !== bit) continue;

    let state: PermissionState = "Not set";
    if ((input.effectiveDeny & bit) === bit) {
      state = (inheritedDeny & bit) === bit ? "Deny (inherited)" : "Deny";
    } else if ((input.effectiveAllow & bit) === bit) {
      state = (inheritedAllow & bit) === bit ? "Allow (inherited)" : "Allow";
    }

    const result: PermissionStateResult = { bit, state };
    const name = action.name?.trim();
    if (name) result.name = name;
    const displayName = action.displayName?.trim();
    if (displayName) result.displayName = displayName;
    results.push(result);
  }

  return results;
}

/**
 * Classify the requested bits of an ACE. Without extended info the
 * effective values are the explicit ones and nothing is inherited.
 */
export function summarizePermissions(
  actions: readonly ActionDefinition[],
  requested: number,
  ace: AccessControlEntry,
): PermissionStateResult[] {
  if (requested === 0) return [];

  const allow = ace.allow ?? 0;
  const deny = ace.deny ?? 0;

  return classifyPermissionStates(actions, {
    requested,
    allow,
    deny,
    effectiveAllow: ace.extendedInfo?.effectiveAllow ?? allow,
    effectiveDeny: ace.extendedInfo?.effectiveDeny ?? deny,
  });
}

/**
 * Label shown for a classified action: display name, then name, then "Bit <n>".
 */
export function permissionResultLabel(result: PermissionStateResult): string {
  return result.displayName ?? result.name ?? `Bit ${result.bit}`;
}
