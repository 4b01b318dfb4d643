/**
 * Permission Request Planner
 *
 * Validates user input for the permission commands, resolves the subject to
 * the identity descriptor ACLs are keyed by and encodes permission tokens
 * against the namespace catalogue. The resulting request values are sent by
 * the caller; the planner re-reads ACLs afterwards to verify and summarize.
 */

import { DependencyFailureError, InvalidInputError, toDependencyFailure } from "../errors.js";
import type { IdentityResolver, SubjectDescriptorBridge } from "../identity/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  describeDescriptorPermissions,
  encodePermissionBits,
  extractDescriptorEntry,
  extractNamespaceActions,
  hasExplicitPermissions,
  listAccessControlEntries,
  summarizePermissions,
  transformNamespace,
  type AccessControlEntryRecord,
  type NamespaceView,
  type PermissionEntryView,
  type PermissionStateResult,
} from "../permissions/index.js";
import type {
  AccessControlEntry,
  AccessControlList,
  AccessControlListQuery,
  AccessControlService,
  ActionDefinition,
  SecurityNamespaceCatalogue,
  SecurityNamespaceDescription,
  SecurityNamespaceQueryOptions,
} from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type PermissionTarget = {
  subject: string;
  namespaceId: string;
  token: string;
};

export type UpdatePermissionsParams = PermissionTarget & {
  allow?: string[];
  deny?: string[];
  merge?: boolean;
};

export type ResetPermissionsParams = PermissionTarget & {
  permissions: string[];
};

export type ListPermissionsParams = {
  namespaceId: string;
  subject?: string;
  token?: string;
  recurse?: boolean;
};

export type UpdateRequest = {
  namespaceId: string;
  token: string;
  merge: boolean;
  entries: AccessControlEntry[];
};

export type ResetRequest = {
  namespaceId: string;
  token: string;
  descriptor: string;
  permissions: number;
  actions: ActionDefinition[];
};

export type DeleteRequest = {
  namespaceId: string;
  token: string;
  descriptor: string;
};

export type PermissionRequestPlannerDeps = {
  resolver: IdentityResolver;
  bridge: SubjectDescriptorBridge;
  namespaces: SecurityNamespaceCatalogue;
  acls: AccessControlService;
  logger?: Logger;
};

// =============================================================================
// Planner
// =============================================================================

export class PermissionRequestPlanner {
  private resolver: IdentityResolver;
  private bridge: SubjectDescriptorBridge;
  private namespaces: SecurityNamespaceCatalogue;
  private acls: AccessControlService;
  private logger: Logger;

  constructor(deps: PermissionRequestPlannerDeps) {
    this.resolver = deps.resolver;
    this.bridge = deps.bridge;
    this.namespaces = deps.namespaces;
    this.acls = deps.acls;
    this.logger = deps.logger ?? createSilentLogger("permission-planner");
  }

  // ---------------------------------------------------------------------------
  // Request preparation
  // ---------------------------------------------------------------------------

  async prepareUpdate(params: UpdatePermissionsParams): Promise<UpdateRequest> {
    const target = validateTarget(params);
    const allowTokens = params.allow ?? [];
    const denyTokens = params.deny ?? [];
    if (allowTokens.length === 0 && denyTokens.length === 0) {
      throw new InvalidInputError("at least one of allow or deny must be provided");
    }

    const descriptor = await this.resolver.resolveAclDescriptor(target.subject);
    const actions = await this.loadActions(target.namespaceId);

    const entry: AccessControlEntry = { descriptor };
    if (allowTokens.length > 0) entry.allow = encodePermissionBits(actions, allowTokens);
    if (denyTokens.length > 0) entry.deny = encodePermissionBits(actions, denyTokens);

    const merge = params.merge ?? false;
    this.logger.debug("prepared access control entry update", {
      token: target.token,
      descriptor,
      allow: entry.allow,
      deny: entry.deny,
      merge,
    });

    return { namespaceId: target.namespaceId, token: target.token, merge, entries: [entry] };
  }

  async prepareReset(params: ResetPermissionsParams): Promise<ResetRequest> {
    const target = validateTarget(params);
    if (params.permissions.every((p) => !p.trim())) {
      throw new InvalidInputError("at least one permission must be provided");
    }

    const descriptor = await this.resolver.resolveAclDescriptor(target.subject);
    const actions = await this.loadActions(target.namespaceId);
    const permissions = encodePermissionBits(actions, params.permissions);
    if (permissions === 0) {
      throw new InvalidInputError("at least one permission must be provided");
    }

    this.logger.debug("computed permission bitmask for reset", {
      namespaceId: target.namespaceId,
      token: target.token,
      bitmask: permissions,
    });

    return { namespaceId: target.namespaceId, token: target.token, descriptor, permissions, actions };
  }

  async prepareDelete(params: PermissionTarget): Promise<DeleteRequest> {
    const target = validateTarget(params);
    const descriptor = await this.resolver.resolveAclDescriptor(target.subject);
    return { namespaceId: target.namespaceId, token: target.token, descriptor };
  }

  // ---------------------------------------------------------------------------
  // Post-change checks
  // ---------------------------------------------------------------------------

  /**
   * Fails when the descriptor still holds explicit permissions on the token.
   */
  async verifyDeletion(request: DeleteRequest): Promise<void> {
    const acls = await this.query(
      {
        namespaceId: request.namespaceId,
        token: request.token,
        descriptors: request.descriptor,
        includeExtendedInfo: true,
      },
      "failed to verify permissions deletion",
    );

    if (hasExplicitPermissions(acls, request.descriptor)) {
      throw new DependencyFailureError(
        `descriptor "${request.descriptor}" still has permissions on token "${request.token}"`,
      );
    }
  }

  /**
   * State of each reset bit after the change. Empty when the descriptor no
   * longer has an entry.
   */
  async summarizeReset(request: ResetRequest): Promise<PermissionStateResult[]> {
    const acls = await this.query(
      {
        namespaceId: request.namespaceId,
        token: request.token,
        descriptors: request.descriptor,
        includeExtendedInfo: true,
      },
      "failed to query updated permissions",
    );

    const ace = extractDescriptorEntry(acls, request.descriptor);
    if (!ace) return [];
    return summarizePermissions(request.actions, request.permissions, ace);
  }

  // ---------------------------------------------------------------------------
  // Read views
  // ---------------------------------------------------------------------------

  /**
   * Label view of a subject's permissions on a token, including inherited
   * values from parent tokens.
   */
  async showPermissions(params: PermissionTarget): Promise<PermissionEntryView | undefined> {
    const target = validateTarget(params);
    const actions = await this.loadActions(target.namespaceId);
    const descriptor = await this.subjectAclDescriptor(target.subject);

    const acls = await this.query(
      {
        namespaceId: target.namespaceId,
        token: target.token,
        descriptors: descriptor,
        includeExtendedInfo: true,
        recurse: true,
      },
      "failed to query access control lists",
    );

    return describeDescriptorPermissions(acls, descriptor, actions);
  }

  /**
   * Raw ACE records for a namespace, optionally narrowed to one subject and
   * token.
   */
  async listPermissions(params: ListPermissionsParams): Promise<AccessControlEntryRecord[]> {
    const namespaceId = validateNamespaceId(params.namespaceId);
    const query: AccessControlListQuery = { namespaceId, includeExtendedInfo: true };

    const subject = params.subject?.trim();
    if (subject) query.descriptors = await this.subjectAclDescriptor(subject);
    const token = params.token?.trim();
    if (token) query.token = token;
    if (params.recurse) query.recurse = true;

    this.logger.debug("querying access control entries", {
      token: token ?? "",
      recurse: params.recurse ?? false,
      subjectFilter: query.descriptors !== undefined,
    });

    const acls = await this.query(query, "failed to query access control lists");
    return listAccessControlEntries(acls, query.descriptors);
  }

  async describeNamespace(namespaceId: string): Promise<NamespaceView[]> {
    const id = validateNamespaceId(namespaceId);
    try {
      const namespaces = await this.namespaces.querySecurityNamespaces(id);
      return namespaces.map(transformNamespace);
    } catch (error) {
      throw toDependencyFailure("failed to load security namespace", error);
    }
  }

  /**
   * Every security namespace of the organization, sorted by name
   * case-insensitively.
   */
  async listNamespaces(options: SecurityNamespaceQueryOptions = {}): Promise<NamespaceView[]> {
    let namespaces: SecurityNamespaceDescription[];
    try {
      namespaces = await this.namespaces.querySecurityNamespaces(undefined, options);
    } catch (error) {
      throw toDependencyFailure("failed to query security namespaces", error);
    }
    this.logger.debug("fetched security namespaces", {
      count: namespaces.length,
      localOnly: options.localOnly ?? false,
    });

    return namespaces
      .map(transformNamespace)
      .sort((a, b) => (a.name ?? "").toLowerCase().localeCompare((b.name ?? "").toLowerCase()));
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  // Graph subject first, then the identity descriptor ACLs are keyed by.
  private async subjectAclDescriptor(member: string): Promise<string> {
    const subject = await this.bridge.resolveSubject(member);
    const descriptor = await this.resolver.resolveAclDescriptor(subject.descriptor);
    this.logger.debug("resolved subject descriptor (acl)", { subject: subject.descriptor, descriptor });
    return descriptor;
  }

  private async loadActions(namespaceId: string): Promise<ActionDefinition[]> {
    try {
      return extractNamespaceActions(await this.namespaces.querySecurityNamespaces(namespaceId));
    } catch (error) {
      throw toDependencyFailure("failed to load namespace actions", error);
    }
  }

  private async query(query: AccessControlListQuery, failure: string): Promise<AccessControlList[]> {
    try {
      return await this.acls.queryAccessControlLists(query);
    } catch (error) {
      throw toDependencyFailure(failure, error);
    }
  }
}

// =============================================================================
// Validation
// =============================================================================

// Any hex UUID; built-in namespace ids do not all carry an RFC 4122 version.
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function validateNamespaceId(value: string): string {
  const namespaceId = value.trim();
  if (!namespaceId) {
    throw new InvalidInputError("namespace id is required");
  }
  if (!UUID_PATTERN.test(namespaceId)) {
    throw new InvalidInputError(`invalid namespace id "${value}"`);
  }
  return namespaceId.toLowerCase();
}

function validateTarget(params: PermissionTarget): PermissionTarget {
  const namespaceId = validateNamespaceId(params.namespaceId);
  const token = params.token.trim();
  if (!token) {
    throw new InvalidInputError("token is required");
  }
  const subject = params.subject.trim();
  if (!subject) {
    throw new InvalidInputError("a subject is required");
  }
  return { namespaceId, token, subject };
}

export function createPermissionPlanner(deps: PermissionRequestPlannerDeps): PermissionRequestPlanner {
  return new PermissionRequestPlanner(deps);
}
