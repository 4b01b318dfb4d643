/**
 * Azure DevOps Security Client
 *
 * Fetch-based REST client for one organization. Implements the identity,
 * graph, security namespace and access control collaborators the resolver
 * and planner depend on. Every call is retried on transient failures and
 * reported to diagnostics.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import type { AuthorizationProvider } from "../credentials/index.js";
import { instrumentedDevOpsCall } from "../diagnostics.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { withDevOpsRetry } from "../retry.js";
import type {
  AccessControlEntry,
  AccessControlEntryUpdate,
  AccessControlList,
  AccessControlListQuery,
  AccessControlService,
  AccessControlWriter,
  DevOpsRetryOptions,
  DirectoryIdentity,
  GraphDirectory,
  GraphSubjectRecord,
  IdentityDirectory,
  ReadIdentitiesQuery,
  SecurityNamespaceCatalogue,
  SecurityNamespaceDescription,
  SecurityNamespaceQueryOptions,
} from "../types.js";
import {
  AccessControlEntryListSchema,
  AccessControlEntrySchema,
  AccessControlListListSchema,
  GraphDescriptorSchema,
  IdentityListSchema,
  RemovalResultSchema,
  SecurityNamespaceListSchema,
  SubjectLookupSchema,
} from "./schemas.js";

export const DEFAULT_API_VERSION = "7.1";
export const GRAPH_API_VERSION = "7.1-preview.1";

// =============================================================================
// Errors
// =============================================================================

export class DevOpsApiError extends Error {
  name = "DevOpsApiError";

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly retryAfter?: string,
  ) {
    super(message);
  }
}

// =============================================================================
// Types
// =============================================================================

export type DevOpsSecurityClientOptions = {
  organization: string;
  credentials: AuthorizationProvider;
  apiVersion?: string;
  retryOptions?: DevOpsRetryOptions;
  logger?: Logger;
};

type Host = "vssps" | "dev";
type QueryParams = Record<string, string | undefined>;

type RequestSpec<S extends TSchema> = {
  service: string;
  operation: string;
  host: Host;
  path: string;
  schema: S;
  method?: "GET" | "POST" | "DELETE";
  params?: QueryParams;
  body?: unknown;
  apiVersion?: string;
};

// =============================================================================
// Client
// =============================================================================

export class DevOpsSecurityClient
  implements IdentityDirectory, GraphDirectory, SecurityNamespaceCatalogue, AccessControlService, AccessControlWriter
{
  private organization: string;
  private credentials: AuthorizationProvider;
  private apiVersion: string;
  private retryOptions?: DevOpsRetryOptions;
  private logger: Logger;

  constructor(options: DevOpsSecurityClientOptions) {
    this.organization = options.organization;
    this.credentials = options.credentials;
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.retryOptions = options.retryOptions;
    this.logger = options.logger ?? createSilentLogger("devops-client");
  }

  // ---------------------------------------------------------------------------
  // Identities
  // ---------------------------------------------------------------------------

  async readIdentities(query: ReadIdentitiesQuery): Promise<DirectoryIdentity[]> {
    const params: QueryParams = { queryMembership: query.queryMembership };
    switch (query.kind) {
      case "descriptor":
        params.descriptors = query.descriptors;
        break;
      case "subjectDescriptor":
        params.subjectDescriptors = query.subjectDescriptors;
        break;
      case "search":
        params.searchFilter = query.searchFilter;
        params.filterValue = query.filterValue;
        params.includeRestrictedVisibility = String(query.includeRestrictedVisibility);
        break;
    }

    const data = await this.request({
      service: "identity",
      operation: "readIdentities",
      host: "vssps",
      path: "_apis/identities",
      schema: IdentityListSchema,
      params,
    });
    return data.value;
  }

  // ---------------------------------------------------------------------------
  // Graph
  // ---------------------------------------------------------------------------

  async lookupSubjects(descriptors: string[]): Promise<Record<string, GraphSubjectRecord>> {
    const data = await this.request({
      service: "graph",
      operation: "lookupSubjects",
      host: "vssps",
      path: "_apis/graph/subjectlookup",
      method: "POST",
      schema: SubjectLookupSchema,
      body: { lookupKeys: descriptors.map((descriptor) => ({ descriptor })) },
      apiVersion: GRAPH_API_VERSION,
    });
    return data.value;
  }

  async getDescriptor(storageKey: string): Promise<string | undefined> {
    const data = await this.request({
      service: "graph",
      operation: "getDescriptor",
      host: "vssps",
      path: `_apis/graph/descriptors/${encodeURIComponent(storageKey)}`,
      schema: GraphDescriptorSchema,
      apiVersion: GRAPH_API_VERSION,
    });
    return data.value || undefined;
  }

  // ---------------------------------------------------------------------------
  // Security
  // ---------------------------------------------------------------------------

  async querySecurityNamespaces(
    namespaceId?: string,
    options: SecurityNamespaceQueryOptions = {},
  ): Promise<SecurityNamespaceDescription[]> {
    const data = await this.request({
      service: "security",
      operation: "querySecurityNamespaces",
      host: "dev",
      path: namespaceId ? `_apis/securitynamespaces/${encodeURIComponent(namespaceId)}` : "_apis/securitynamespaces",
      schema: SecurityNamespaceListSchema,
      params: { localOnly: options.localOnly ? "true" : undefined },
    });
    return data.value;
  }

  async queryAccessControlLists(query: AccessControlListQuery): Promise<AccessControlList[]> {
    const data = await this.request({
      service: "security",
      operation: "queryAccessControlLists",
      host: "dev",
      path: `_apis/accesscontrollists/${encodeURIComponent(query.namespaceId)}`,
      schema: AccessControlListListSchema,
      params: {
        token: query.token,
        descriptors: query.descriptors,
        includeExtendedInfo: query.includeExtendedInfo === undefined ? undefined : String(query.includeExtendedInfo),
        recurse: query.recurse === undefined ? undefined : String(query.recurse),
      },
    });
    return data.value;
  }

  async setAccessControlEntries(namespaceId: string, update: AccessControlEntryUpdate): Promise<AccessControlEntry[]> {
    const data = await this.request({
      service: "security",
      operation: "setAccessControlEntries",
      host: "dev",
      path: `_apis/accesscontrolentries/${encodeURIComponent(namespaceId)}`,
      method: "POST",
      schema: AccessControlEntryListSchema,
      body: update,
    });
    return data.value;
  }

  async removeAccessControlEntries(namespaceId: string, token: string, descriptors: string[]): Promise<boolean> {
    const data = await this.request({
      service: "security",
      operation: "removeAccessControlEntries",
      host: "dev",
      path: `_apis/accesscontrolentries/${encodeURIComponent(namespaceId)}`,
      method: "DELETE",
      schema: RemovalResultSchema,
      params: { token, descriptors: descriptors.join(",") },
    });
    return typeof data === "boolean" ? data : data.value;
  }

  async removePermission(
    namespaceId: string,
    token: string,
    descriptor: string,
    permissions: number,
  ): Promise<AccessControlEntry | undefined> {
    return this.request({
      service: "security",
      operation: "removePermission",
      host: "dev",
      path: `_apis/permissions/${encodeURIComponent(namespaceId)}/${permissions}`,
      method: "DELETE",
      schema: AccessControlEntrySchema,
      params: { token, descriptor },
    });
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  buildUrl(host: Host, path: string, params: QueryParams = {}, apiVersion = this.apiVersion): string {
    const base = host === "vssps" ? "https://vssps.dev.azure.com" : "https://dev.azure.com";
    const url = new URL(`${base}/${encodeURIComponent(this.organization)}/${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, value);
    }
    url.searchParams.set("api-version", apiVersion);
    return url.toString();
  }

  private async request<S extends TSchema>(spec: RequestSpec<S>): Promise<Static<S>> {
    const url = this.buildUrl(spec.host, spec.path, spec.params, spec.apiVersion);
    const method = spec.method ?? "GET";

    return instrumentedDevOpsCall(
      spec.service,
      spec.operation,
      () =>
        withDevOpsRetry(async () => {
          this.logger.debug("devops request", { method, url });
          const authorization = await this.credentials.getAuthorizationHeader();
          const response = await fetch(url, {
            method,
            headers: {
              Authorization: authorization,
              Accept: "application/json",
              "Content-Type": "application/json",
            },
            body: spec.body === undefined ? undefined : JSON.stringify(spec.body),
          });

          if (!response.ok) {
            throw new DevOpsApiError(
              `DevOps API error: ${response.status} ${response.statusText}`,
              response.status,
              response.headers.get("retry-after") ?? undefined,
            );
          }

          const data = dropNulls(await response.json());
          if (!Check(spec.schema, data)) {
            const first = Errors(spec.schema, data).First();
            const detail = first ? `${first.path || "(root)"}: ${first.message}` : "schema mismatch";
            throw new DevOpsApiError(`unexpected response from ${spec.operation}: ${detail}`, response.status);
          }
          return data;
        }, this.retryOptions),
      { organization: this.organization, metadata: { method, path: spec.path } },
    );
  }
}

// The service serializes absent values as null; the schemas model them as
// missing properties. A descriptor read with no match answers `[null]`, so
// null array items are dropped too.
function dropNulls(value: unknown): unknown {
  if (Array.isArray(value)) return value.filter((entry) => entry !== null).map(dropNulls);
  if (typeof value !== "object" || value === null) return value;

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== null) result[key] = dropNulls(entry);
  }
  return result;
}

// =============================================================================
// Factory
// =============================================================================

export function createDevOpsSecurityClient(options: DevOpsSecurityClientOptions): DevOpsSecurityClient {
  return new DevOpsSecurityClient(options);
}
