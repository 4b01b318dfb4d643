/**
 * Identity Resolver
 *
 * Resolves a member token (SID, subject descriptor, email, principal name,
 * alias or group name) to exactly one directory identity.
 */

import { AmbiguousIdentityError, InvalidInputError, NotFoundError, toDependencyFailure } from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type {
  AmbiguityPolicy,
  DirectoryIdentity,
  IdentityDirectory,
  IdentitySearchFilter,
  ReadIdentitiesQuery,
} from "../types.js";
import { classifySubjectToken } from "./classifier.js";
import { determineSearchFilters } from "./search-filters.js";

export const IDENTITY_DESCRIPTOR_PREFIX = "Microsoft.TeamFoundation.Identity;";

export type IdentityResolverOptions = {
  logger?: Logger;
  ambiguityPolicy?: AmbiguityPolicy;
};

export class IdentityResolver {
  private directory: IdentityDirectory;
  private logger: Logger;
  private ambiguityPolicy: AmbiguityPolicy;

  constructor(directory: IdentityDirectory, options: IdentityResolverOptions = {}) {
    this.directory = directory;
    this.logger = options.logger ?? createSilentLogger("identity-resolver");
    this.ambiguityPolicy = options.ambiguityPolicy ?? "first-signal";
  }

  /**
   * Resolve a member token to a single identity.
   *
   * SID and descriptor tokens fail with NotFound when nothing matches. Free
   * text returns `undefined` once every search filter came back empty.
   */
  async resolveIdentity(member: string): Promise<DirectoryIdentity | undefined> {
    const token = member.trim();
    const kind = classifySubjectToken(token);

    switch (kind) {
      case "empty":
        throw new InvalidInputError("member must not be empty");

      case "sid": {
        this.logger.debug("member is a SID", { member: token });
        const descriptor = token.includes(";") ? token : `${IDENTITY_DESCRIPTOR_PREFIX}${token}`;
        return this.readSingle(token, { kind: "descriptor", descriptors: descriptor, queryMembership: "None" });
      }

      case "descriptor":
        this.logger.debug("member is a subject descriptor", { member: token });
        return this.readSingle(token, { kind: "subjectDescriptor", subjectDescriptors: token, queryMembership: "None" });

      case "text":
        return this.ambiguityPolicy === "exhaustive" ? this.searchExhaustive(token) : this.searchFirstSignal(token);
    }
  }

  /**
   * Resolve a member token to the identity descriptor ACLs are keyed by.
   */
  async resolveAclDescriptor(member: string): Promise<string> {
    const identity = await this.resolveIdentity(member);
    if (!identity) {
      throw new NotFoundError(`no identity found for "${member.trim()}"`);
    }
    const descriptor = identity.descriptor?.trim() ?? "";
    if (!descriptor) {
      throw new NotFoundError(`identity "${member.trim()}" does not have a descriptor`);
    }
    this.logger.debug("resolved identity descriptor", { member: member.trim(), descriptor });
    return descriptor;
  }

  private async readSingle(token: string, query: ReadIdentitiesQuery): Promise<DirectoryIdentity> {
    const identities = await this.read(token, query);
    if (identities.length === 0) {
      throw new NotFoundError(`identity "${token}" not found`);
    }
    if (identities.length > 1) {
      throw new AmbiguousIdentityError(token, identities.length);
    }
    return identities[0];
  }

  // Stops at the first filter that returns anything; more than one match
  // fails even when an untried filter might have been unique.
  private async searchFirstSignal(token: string): Promise<DirectoryIdentity | undefined> {
    for (const filter of determineSearchFilters(token)) {
      this.logger.debug("resolving member via identity search", { filter, value: token });
      const identities = await this.read(token, searchQuery(filter, token));
      if (identities.length === 0) continue;
      if (identities.length > 1) {
        throw new AmbiguousIdentityError(token, identities.length);
      }
      return identities[0];
    }
    return undefined;
  }

  private async searchExhaustive(token: string): Promise<DirectoryIdentity | undefined> {
    const unique = new Map<string, DirectoryIdentity>();
    let anonymous = 0;

    for (const filter of determineSearchFilters(token)) {
      this.logger.debug("collecting identity search results", { filter, value: token });
      for (const identity of await this.read(token, searchQuery(filter, token))) {
        const key = identity.id ?? identity.descriptor ?? identity.subjectDescriptor;
        unique.set(key ?? `#${anonymous++}`, identity);
      }
    }

    if (unique.size > 1) {
      throw new AmbiguousIdentityError(token, unique.size);
    }
    const [identity] = unique.values();
    return identity;
  }

  private async read(token: string, query: ReadIdentitiesQuery): Promise<DirectoryIdentity[]> {
    try {
      return await this.directory.readIdentities(query);
    } catch (error) {
      throw toDependencyFailure(`failed to resolve member "${token}"`, error);
    }
  }
}

function searchQuery(filter: IdentitySearchFilter, value: string): ReadIdentitiesQuery {
  return {
    kind: "search",
    searchFilter: filter,
    filterValue: value,
    queryMembership: "None",
    includeRestrictedVisibility: true,
  };
}

export function createIdentityResolver(
  directory: IdentityDirectory,
  options?: IdentityResolverOptions,
): IdentityResolver {
  return new IdentityResolver(directory, options);
}
