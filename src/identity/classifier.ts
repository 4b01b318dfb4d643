/**
 * Subject token classification.
 *
 * A descriptor is `<SubjectType>.<Identifier>` where the identifier is
 * unpadded base64url ('+' → '-', '/' → '_', '=' removed). A security
 * identifier is `S-<revision>-<authority>-<sub>...`, optionally prefixed by
 * an identity type and `;`.
 */

const DESCRIPTOR_PATTERN = /^[a-zA-Z0-9]+\.[a-zA-Z0-9_-]+$/;
const SID_PATTERN = /^(?:[^;\s]+;)?s-\d+-\d+(?:-\d+)+$/i;

export type SubjectTokenKind = "empty" | "sid" | "descriptor" | "text";

export function isSecurityIdentifier(value: string): boolean {
  const trimmed = value.trim();
  if (!trimmed) return false;
  return SID_PATTERN.test(trimmed);
}

export function isDescriptor(value: string): boolean {
  const trimmed = value.trim();
  if (!trimmed) return false;
  return DESCRIPTOR_PATTERN.test(trimmed);
}

/**
 * Single authoritative classification: SID, then descriptor, then free text.
 * Every call site that branches on token shape goes through here.
 */
export function classifySubjectToken(value: string): SubjectTokenKind {
  if (!value.trim()) return "empty";
  if (isSecurityIdentifier(value)) return "sid";
  if (isDescriptor(value)) return "descriptor";
  return "text";
}
