import type { AccessControlEntry, AceExtendedInformation } from "../types.js";

/**
 * Deep copy of an ACE. ACL query results are shared between call sites
 * (show, list, delete verification), so summaries always work on a copy.
 * Absent fields stay absent; the descriptor is trimmed.
 */
export function cloneAccessControlEntry(source: AccessControlEntry): AccessControlEntry {
  const clone: AccessControlEntry = {};

  if (source.descriptor !== undefined) clone.descriptor = source.descriptor.trim();
  if (source.allow !== undefined) clone.allow = source.allow;
  if (source.deny !== undefined) clone.deny = source.deny;
  if (source.extendedInfo !== undefined) clone.extendedInfo = cloneAceExtendedInfo(source.extendedInfo);

  return clone;
}

export function cloneAceExtendedInfo(source: AceExtendedInformation): AceExtendedInformation {
  const clone: AceExtendedInformation = {};

  if (source.effectiveAllow !== undefined) clone.effectiveAllow = source.effectiveAllow;
  if (source.effectiveDeny !== undefined) clone.effectiveDeny = source.effectiveDeny;
  if (source.inheritedAllow !== undefined) clone.inheritedAllow = source.inheritedAllow;
  if (source.inheritedDeny !== undefined) clone.inheritedDeny = source.inheritedDeny;

  return clone;
}
