/**
 * Azure DevOps Access — Shared Types
 *
 * Wire-level records exchanged with the Azure DevOps identity, graph and
 * security services, plus the common configuration types.
 */

// =============================================================================
// Identities & Subjects
// =============================================================================

export type SubjectKind = "User" | "Group";

/**
 * Canonical graph subject. `descriptor` is always non-empty once resolved.
 */
export type Subject = {
  descriptor: string;
  displayName: string;
  subjectKind: SubjectKind;
  origin?: string;
  originId?: string;
};

/**
 * Raw graph subject as returned by the subject lookup API.
 */
export type GraphSubjectRecord = {
  descriptor?: string;
  displayName?: string;
  subjectKind?: string;
  origin?: string;
  originId?: string;
  legacyDescriptor?: string;
};

/**
 * Identity returned by the Identity Directory. Read-only.
 */
export type DirectoryIdentity = {
  /** Storage key. */
  id?: string;
  /** Identity descriptor (`<identityType>;<sid>`), the key ACLs use. */
  descriptor?: string;
  /** Graph descriptor (`<type>.<encoded-id>`). */
  subjectDescriptor?: string;
  providerDisplayName?: string;
  isContainer?: boolean;
  properties?: Record<string, unknown>;
};

export type IdentitySearchFilter =
  | "General"
  | "DirectoryAlias"
  | "MailAddress"
  | "AccountName"
  | "LocalGroupName";

export type QueryMembership = "None" | "Direct" | "Expanded";

export type ReadIdentitiesQuery =
  | { kind: "descriptor"; descriptors: string; queryMembership: QueryMembership }
  | { kind: "subjectDescriptor"; subjectDescriptors: string; queryMembership: QueryMembership }
  | {
      kind: "search";
      searchFilter: IdentitySearchFilter;
      filterValue: string;
      queryMembership: QueryMembership;
      includeRestrictedVisibility: boolean;
    };

// =============================================================================
// Security Namespaces & ACLs
// =============================================================================

export type ActionDefinition = {
  bit?: number;
  name?: string;
  displayName?: string;
  namespaceId?: string;
};

export type SecurityNamespaceDescription = {
  namespaceId?: string;
  name?: string;
  displayName?: string;
  dataspaceCategory?: string;
  isRemotable?: boolean;
  extensionType?: string;
  elementLength?: number;
  separatorValue?: string;
  writePermission?: number;
  readPermission?: number;
  useTokenTranslator?: boolean;
  systemBitMask?: number;
  structureValue?: number;
  actions?: ActionDefinition[];
};

export type AceExtendedInformation = {
  effectiveAllow?: number;
  effectiveDeny?: number;
  inheritedAllow?: number;
  inheritedDeny?: number;
};

export type AccessControlEntry = {
  descriptor?: string;
  allow?: number;
  deny?: number;
  extendedInfo?: AceExtendedInformation;
};

export type AccessControlList = {
  token?: string;
  inheritPermissions?: boolean;
  acesDictionary?: Record<string, AccessControlEntry>;
};

export type AccessControlListQuery = {
  namespaceId: string;
  token?: string;
  descriptors?: string;
  includeExtendedInfo?: boolean;
  recurse?: boolean;
};

// =============================================================================
// External Collaborators
// =============================================================================

export interface IdentityDirectory {
  readIdentities(query: ReadIdentitiesQuery): Promise<DirectoryIdentity[]>;
}

export interface GraphDirectory {
  /** Descriptor-keyed lookup. A 404 may surface as an error with `statusCode: 404`. */
  lookupSubjects(descriptors: string[]): Promise<Record<string, GraphSubjectRecord>>;
  getDescriptor(storageKey: string): Promise<string | undefined>;
}

export type SecurityNamespaceQueryOptions = {
  /** Only namespaces defined locally within the organization. */
  localOnly?: boolean;
};

export interface SecurityNamespaceCatalogue {
  /** One namespace by id, or every namespace when the id is omitted. */
  querySecurityNamespaces(
    namespaceId?: string,
    options?: SecurityNamespaceQueryOptions,
  ): Promise<SecurityNamespaceDescription[]>;
}

export interface AccessControlService {
  queryAccessControlLists(query: AccessControlListQuery): Promise<AccessControlList[]>;
}

export type AccessControlEntryUpdate = {
  token: string;
  merge: boolean;
  accessControlEntries: AccessControlEntry[];
};

/**
 * Write side of the security service. Only the CLI calls it, with the
 * requests the permission planner prepares.
 */
export interface AccessControlWriter {
  setAccessControlEntries(namespaceId: string, update: AccessControlEntryUpdate): Promise<AccessControlEntry[]>;
  /** Resolves `true` when the service confirms the removal. */
  removeAccessControlEntries(namespaceId: string, token: string, descriptors: string[]): Promise<boolean>;
  /** Clears `permissions` from both allow and deny of one ACE. */
  removePermission(
    namespaceId: string,
    token: string,
    descriptor: string,
    permissions: number,
  ): Promise<AccessControlEntry | undefined>;
}

// =============================================================================
// Common Configuration
// =============================================================================

export type DevOpsRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

/**
 * How free-text lookups treat a filter that returns more than one identity.
 *
 * - `first-signal`: fail on the first ambiguous filter, untried filters are skipped.
 * - `exhaustive`: query every filter and decide on the de-duplicated union.
 */
export type AmbiguityPolicy = "first-signal" | "exhaustive";
