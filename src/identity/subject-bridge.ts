/**
 * Subject Descriptor Bridge
 *
 * Turns a member token into a canonical graph subject. Descriptors are looked
 * up directly; anything else goes through the identity resolver first, and a
 * minimal subject is synthesized when the graph has no record for the
 * resolved descriptor.
 */

import { InvalidInputError, NotFoundError, toDependencyFailure } from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { getErrorStatusCode } from "../retry.js";
import type { DirectoryIdentity, GraphDirectory, GraphSubjectRecord, Subject, SubjectKind } from "../types.js";
import { classifySubjectToken } from "./classifier.js";
import type { IdentityResolver } from "./resolver.js";

export class SubjectDescriptorBridge {
  private resolver: IdentityResolver;
  private graph: GraphDirectory;
  private logger: Logger;

  constructor(resolver: IdentityResolver, graph: GraphDirectory, options: { logger?: Logger } = {}) {
    this.resolver = resolver;
    this.graph = graph;
    this.logger = options.logger ?? createSilentLogger("subject-bridge");
  }

  async resolveSubject(member: string): Promise<Subject> {
    const token = member.trim();
    const kind = classifySubjectToken(token);
    if (kind === "empty") {
      throw new InvalidInputError("member must not be empty");
    }

    if (kind === "descriptor") {
      this.logger.debug("attempting graph subject lookup for descriptor", { descriptor: token });
      const subject = await this.lookupGraphSubject(token);
      if (!subject) {
        throw new NotFoundError(`descriptor "${token}" was not found`);
      }
      this.logger.debug("resolved member via graph descriptor lookup", {
        descriptor: token,
        displayName: subject.displayName,
        subjectKind: subject.subjectKind,
      });
      return subject;
    }

    const identity = await this.resolver.resolveIdentity(token);
    if (!identity) {
      throw new NotFoundError(`no identity found for "${token}"`);
    }

    const descriptor = await this.descriptorFor(token, identity);
    const subject = await this.lookupGraphSubject(descriptor);
    if (subject) return subject;

    this.logger.debug("graph has no subject for descriptor; synthesizing", { descriptor });
    return {
      descriptor,
      displayName: identity.providerDisplayName ?? "",
      subjectKind: identitySubjectKind(identity),
    };
  }

  /**
   * Single-key graph lookup. A 404 is "no match". Matches the exact key
   * first, then a case-insensitive descriptor in the returned records.
   */
  async lookupGraphSubject(descriptor: string): Promise<Subject | undefined> {
    const key = descriptor.trim();
    if (!key) return undefined;

    let result: Record<string, GraphSubjectRecord>;
    try {
      result = await this.graph.lookupSubjects([key]);
    } catch (error) {
      if (getErrorStatusCode(error) === 404) return undefined;
      throw toDependencyFailure(`failed to lookup descriptor "${key}"`, error);
    }

    const exact = result[key];
    if (exact) return toSubject(exact, key);

    const lowered = key.toLowerCase();
    for (const record of Object.values(result)) {
      if (record.descriptor !== undefined && record.descriptor.toLowerCase() === lowered) {
        return toSubject(record, record.descriptor);
      }
    }
    return undefined;
  }

  private async descriptorFor(token: string, identity: DirectoryIdentity): Promise<string> {
    const direct = identity.subjectDescriptor?.trim();
    if (direct) return direct;

    if (!identity.id) {
      throw new NotFoundError(`identity for "${token}" is missing descriptor and storage key`);
    }

    let fetched: string | undefined;
    try {
      fetched = await this.graph.getDescriptor(identity.id);
    } catch (error) {
      throw toDependencyFailure("failed to resolve descriptor from storage key", error);
    }

    const descriptor = fetched?.trim();
    if (!descriptor) {
      throw new NotFoundError(`descriptor lookup returned empty result for "${token}"`);
    }
    return descriptor;
  }
}

export function identitySubjectKind(identity: DirectoryIdentity): SubjectKind {
  return identity.isContainer === true ? "Group" : "User";
}

function toSubject(record: GraphSubjectRecord, fallbackDescriptor: string): Subject {
  const descriptor = record.descriptor?.trim() || fallbackDescriptor;
  return {
    descriptor,
    displayName: record.displayName ?? "",
    subjectKind: record.subjectKind?.toLowerCase() === "group" ? "Group" : "User",
    origin: record.origin,
    originId: record.originId,
  };
}

export function createSubjectBridge(
  resolver: IdentityResolver,
  graph: GraphDirectory,
  options?: { logger?: Logger },
): SubjectDescriptorBridge {
  return new SubjectDescriptorBridge(resolver, graph, options);
}
