/**
 * Access Control Lists
 *
 * Descriptor-keyed views over ACL query results. Every ACE handed back to a
 * caller is a clone, so results from one query can be reused safely.
 */

import { InvalidInputError, toDependencyFailure } from "../errors.js";
import type {
  AccessControlEntry,
  AccessControlList,
  AccessControlService,
  ActionDefinition,
} from "../types.js";
import { cloneAccessControlEntry } from "./ace-snapshot.js";
import { decodePermissionLabels } from "./bit-codec.js";

// =============================================================================
// Export Views
// =============================================================================

/** One ACE rendered with decoded permission labels. */
export type PermissionEntryView = {
  token?: string;
  descriptor: string;
  inheritPermissions?: boolean;
  allow?: string[];
  deny?: string[];
  effectiveAllow?: string[];
  effectiveDeny?: string[];
  inheritedAllow?: string[];
  inheritedDeny?: string[];
};

/** One ACE with its raw masks. */
export type AccessControlEntryRecord = {
  token?: string;
  descriptor: string;
  inheritPermissions?: boolean;
  allow?: number;
  deny?: number;
  effectiveAllow?: number;
  effectiveDeny?: number;
  inheritedAllow?: number;
  inheritedDeny?: number;
};

// =============================================================================
// Lookup
// =============================================================================

/**
 * Clone of the first ACE keyed by `descriptor`. An exact key wins; otherwise
 * keys are compared trimmed and case-insensitively.
 */
export function extractDescriptorEntry(
  acls: readonly AccessControlList[] | undefined,
  descriptor: string,
): AccessControlEntry | undefined {
  if (!acls) return undefined;
  const wanted = descriptor.toLowerCase();

  for (const acl of acls) {
    const aces = acl.acesDictionary;
    if (!aces) continue;

    const exact = aces[descriptor];
    if (exact) return cloneAccessControlEntry(exact);

    for (const [key, ace] of Object.entries(aces)) {
      if (key.trim().toLowerCase() === wanted) return cloneAccessControlEntry(ace);
    }
  }

  return undefined;
}

export type FindAccessControlEntryParams = {
  namespaceId: string;
  token?: string;
  descriptor: string;
};

/**
 * Query the ACL for one descriptor (with extended info) and return a clone of
 * the first ACE found.
 */
export async function findAccessControlEntry(
  service: AccessControlService,
  params: FindAccessControlEntryParams,
): Promise<AccessControlEntry | undefined> {
  const descriptor = params.descriptor.trim();
  if (!descriptor) {
    throw new InvalidInputError("descriptor is required");
  }

  const token = params.token?.trim();
  let acls: AccessControlList[];
  try {
    acls = await service.queryAccessControlLists({
      namespaceId: params.namespaceId,
      descriptors: descriptor,
      includeExtendedInfo: true,
      ...(token ? { token } : {}),
    });
  } catch (error) {
    throw toDependencyFailure("failed to query access control lists", error);
  }

  for (const acl of acls) {
    const first = Object.values(acl.acesDictionary ?? {})[0];
    if (first) return cloneAccessControlEntry(first);
  }
  return undefined;
}

/**
 * True when an ACE for `descriptor` still carries a non-zero allow or deny.
 * The ACE's own descriptor is compared when present, else its dictionary key.
 */
export function hasExplicitPermissions(acls: readonly AccessControlList[] | undefined, descriptor: string): boolean {
  if (!acls) return false;

  for (const acl of acls) {
    for (const [key, ace] of Object.entries(acl.acesDictionary ?? {})) {
      const candidate = (ace.descriptor ?? key).trim();
      if (candidate !== descriptor) continue;
      if ((ace.allow ?? 0) !== 0 || (ace.deny ?? 0) !== 0) return true;
    }
  }

  return false;
}

// =============================================================================
// Rendering
// =============================================================================

function labelsFor(actions: readonly ActionDefinition[], value: number | undefined): string[] | undefined {
  return value === undefined ? undefined : decodePermissionLabels(actions, value);
}

/**
 * Label view of one ACE. Masks that are absent stay absent; a zero mask
 * renders as an empty list.
 */
export function describeAccessControlEntry(
  acl: AccessControlList,
  descriptor: string,
  ace: AccessControlEntry,
  actions: readonly ActionDefinition[],
): PermissionEntryView {
  const info = ace.extendedInfo;
  const view: PermissionEntryView = { descriptor };

  if (acl.token !== undefined) view.token = acl.token;
  if (acl.inheritPermissions !== undefined) view.inheritPermissions = acl.inheritPermissions;

  const allow = labelsFor(actions, ace.allow);
  if (allow) view.allow = allow;
  const deny = labelsFor(actions, ace.deny);
  if (deny) view.deny = deny;
  const effectiveAllow = labelsFor(actions, info?.effectiveAllow);
  if (effectiveAllow) view.effectiveAllow = effectiveAllow;
  const effectiveDeny = labelsFor(actions, info?.effectiveDeny);
  if (effectiveDeny) view.effectiveDeny = effectiveDeny;
  const inheritedAllow = labelsFor(actions, info?.inheritedAllow);
  if (inheritedAllow) view.inheritedAllow = inheritedAllow;
  const inheritedDeny = labelsFor(actions, info?.inheritedDeny);
  if (inheritedDeny) view.inheritedDeny = inheritedDeny;

  return view;
}

/**
 * Label view of the first ACL holding an exact `descriptor` key.
 */
export function describeDescriptorPermissions(
  acls: readonly AccessControlList[] | undefined,
  descriptor: string,
  actions: readonly ActionDefinition[],
): PermissionEntryView | undefined {
  for (const acl of acls ?? []) {
    const ace = acl.acesDictionary?.[descriptor];
    if (ace) return describeAccessControlEntry(acl, descriptor, cloneAccessControlEntry(ace), actions);
  }
  return undefined;
}

/**
 * Flatten ACLs into raw entry records. With a descriptor filter only ACLs
 * holding that key contribute; without one every ACE is listed under its
 * trimmed descriptor (falling back to the dictionary key).
 */
export function listAccessControlEntries(
  acls: readonly AccessControlList[] | undefined,
  descriptor?: string,
): AccessControlEntryRecord[] {
  const filter = descriptor?.trim();
  const records: AccessControlEntryRecord[] = [];

  for (const acl of acls ?? []) {
    const aces = acl.acesDictionary;
    if (!aces) continue;

    if (filter) {
      const ace = aces[filter];
      if (ace) records.push(toRecord(acl, filter, ace));
      continue;
    }

    for (const [key, ace] of Object.entries(aces)) {
      records.push(toRecord(acl, ace.descriptor?.trim() || key, ace));
    }
  }

  return records;
}

function toRecord(acl: AccessControlList, descriptor: string, ace: AccessControlEntry): AccessControlEntryRecord {
  const info = ace.extendedInfo;
  const record: AccessControlEntryRecord = { descriptor };

  if (acl.token !== undefined) record.token = acl.token;
  if (acl.inheritPermissions !== undefined) record.inheritPermissions = acl.inheritPermissions;
  if (ace.allow !== undefined) record.allow = ace.allow;
  if (ace.deny !== undefined) record.deny = ace.deny;
  if (info?.effectiveAllow !== undefined) record.effectiveAllow = info.effectiveAllow;
  if (info?.effectiveDeny !== undefined) record.effectiveDeny = info.effectiveDeny;
  if (info?.inheritedAllow !== undefined) record.inheritedAllow = info.inheritedAllow;
  if (info?.inheritedDeny !== undefined) record.inheritedDeny = info.inheritedDeny;

  return record;
}
