/**
 * Permission Request Planner — Unit Tests
 */

import { describe, it, expect, vi } from "vitest";
import { PermissionRequestPlanner } from "./planner.js";
import { IdentityResolver, SubjectDescriptorBridge } from "../identity/index.js";
import type {
  AccessControlList,
  AccessControlListQuery,
  DirectoryIdentity,
  GraphDirectory,
  IdentityDirectory,
  ReadIdentitiesQuery,
  SecurityNamespaceCatalogue,
  SecurityNamespaceDescription,
  SecurityNamespaceQueryOptions,
} from "../types.js";

const NAMESPACE_ID = "2e9eb7ed-3c0a-47d4-87c1-0ffdd275fd87";
const TOKEN = "repoV2/project-1";
const ALICE_ACL = "Microsoft.TeamFoundation.Identity;S-1-9-1551374245-1";

const alice: DirectoryIdentity = {
  id: "11111111-1111-1111-1111-111111111111",
  descriptor: ALICE_ACL,
  subjectDescriptor: "aad.YWxpY2U",
  providerDisplayName: "Alice",
  isContainer: false,
};

function makePlanner(options: {
  acls?: AccessControlList[];
  namespaceError?: unknown;
} = {}) {
  const readIdentities = vi.fn(async (query: ReadIdentitiesQuery) => {
    if (query.kind === "search" && query.searchFilter === "General" && query.filterValue === "alice@example.com") {
      return [alice];
    }
    if (query.kind === "subjectDescriptor" && query.subjectDescriptors === "aad.YWxpY2U") return [alice];
    return [];
  });
  const directory: IdentityDirectory = { readIdentities };

  const graph: GraphDirectory = {
    lookupSubjects: vi.fn(async () => ({
      "aad.YWxpY2U": { descriptor: "aad.YWxpY2U", displayName: "Alice", subjectKind: "user" },
    })),
    getDescriptor: vi.fn(async () => undefined),
  };

  const querySecurityNamespaces = vi.fn(
    async (_namespaceId?: string, _options?: SecurityNamespaceQueryOptions): Promise<SecurityNamespaceDescription[]> => {
      if (options.namespaceError !== undefined) throw options.namespaceError;
      return [
        {
          namespaceId: NAMESPACE_ID,
          name: "Git Repositories",
          actions: [
            { bit: 1, name: "Read", displayName: "Read" },
            { bit: 2, name: "Edit", displayName: "Modify" },
            { bit: 4, name: "Contribute" },
          ],
        },
      ];
    },
  );
  const namespaces: SecurityNamespaceCatalogue = { querySecurityNamespaces };

  const queryAccessControlLists = vi.fn(async (_query: AccessControlListQuery) => options.acls ?? []);

  const resolver = new IdentityResolver(directory);
  const planner = new PermissionRequestPlanner({
    resolver,
    bridge: new SubjectDescriptorBridge(resolver, graph),
    namespaces,
    acls: { queryAccessControlLists },
  });

  return { planner, readIdentities, querySecurityNamespaces, queryAccessControlLists };
}

describe("PermissionRequestPlanner", () => {
  describe("input validation", () => {
    it("rejects a namespace id that is not a UUID", async () => {
      const { planner } = makePlanner();
      await expect(
        planner.prepareDelete({ subject: "alice@example.com", namespaceId: "not-a-uuid", token: TOKEN }),
      ).rejects.toMatchObject({ code: "InvalidInput", message: 'invalid namespace id "not-a-uuid"' });
    });

    it("accepts a hex UUID without an RFC version and lower-cases it", async () => {
      const { planner, querySecurityNamespaces } = makePlanner();

      await planner.describeNamespace("5AB15BC8-4EA1-D0F3-8344-CAB8FE976877");

      expect(querySecurityNamespaces).toHaveBeenCalledWith("5ab15bc8-4ea1-d0f3-8344-cab8fe976877");
    });

    it("requires namespace id, token and subject", async () => {
      const { planner, readIdentities } = makePlanner();

      await expect(planner.prepareDelete({ subject: "alice", namespaceId: " ", token: TOKEN })).rejects.toThrow(
        "namespace id is required",
      );
      await expect(planner.prepareDelete({ subject: "alice", namespaceId: NAMESPACE_ID, token: "" })).rejects.toThrow(
        "token is required",
      );
      await expect(planner.prepareDelete({ subject: " ", namespaceId: NAMESPACE_ID, token: TOKEN })).rejects.toThrow(
        "a subject is required",
      );
      expect(readIdentities).not.toHaveBeenCalled();
    });
  });

  describe("prepareUpdate", () => {
    it("encodes allow and deny for the identity descriptor", async () => {
      const { planner, querySecurityNamespaces } = makePlanner();

      const request = await planner.prepareUpdate({
        subject: "alice@example.com",
        namespaceId: NAMESPACE_ID.toUpperCase(),
        token: ` ${TOKEN} `,
        allow: ["Read", "Modify"],
        deny: ["0x4"],
        merge: true,
      });

      expect(request).toEqual({
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        merge: true,
        entries: [{ descriptor: ALICE_ACL, allow: 3, deny: 4 }],
      });
      expect(querySecurityNamespaces).toHaveBeenCalledWith(NAMESPACE_ID);
    });

    it("leaves out the side that was not given", async () => {
      const { planner } = makePlanner();
      const request = await planner.prepareUpdate({
        subject: "alice@example.com",
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        deny: ["Contribute"],
      });
      expect(request.merge).toBe(false);
      expect(request.entries).toEqual([{ descriptor: ALICE_ACL, deny: 4 }]);
    });

    it("requires allow or deny", async () => {
      const { planner, readIdentities } = makePlanner();
      await expect(
        planner.prepareUpdate({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN }),
      ).rejects.toMatchObject({ code: "InvalidInput", message: "at least one of allow or deny must be provided" });
      expect(readIdentities).not.toHaveBeenCalled();
    });

    it("propagates encoding failures", async () => {
      const { planner } = makePlanner();
      await expect(
        planner.prepareUpdate({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN, allow: ["Bogus"] }),
      ).rejects.toMatchObject({ code: "UnrecognizedPermissionToken" });
    });

    it("wraps namespace catalogue failures", async () => {
      const { planner } = makePlanner({ namespaceError: new Error("boom") });
      await expect(
        planner.prepareUpdate({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN, allow: ["Read"] }),
      ).rejects.toMatchObject({ code: "DependencyFailure", message: "failed to load namespace actions: boom" });
    });
  });

  describe("reset", () => {
    const afterReset: AccessControlList[] = [
      {
        token: TOKEN,
        acesDictionary: {
          [ALICE_ACL]: { descriptor: ALICE_ACL, allow: 2, deny: 0, extendedInfo: { effectiveAllow: 6, effectiveDeny: 0 } },
        },
      },
    ];

    it("prepares the combined bitmask", async () => {
      const { planner } = makePlanner();
      const request = await planner.prepareReset({
        subject: "alice@example.com",
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        permissions: ["Edit", "Contribute"],
      });
      expect(request.descriptor).toBe(ALICE_ACL);
      expect(request.permissions).toBe(6);
      expect(request.actions).toHaveLength(3);
    });

    it("rejects an empty permission list", async () => {
      const { planner } = makePlanner();
      await expect(
        planner.prepareReset({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN, permissions: ["", " "] }),
      ).rejects.toThrow("at least one permission must be provided");
    });

    it("summarizes the reset bits after the change", async () => {
      const { planner, queryAccessControlLists } = makePlanner({ acls: afterReset });

      const request = await planner.prepareReset({
        subject: "alice@example.com",
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        permissions: ["Edit", "Contribute"],
      });
      const results = await planner.summarizeReset(request);

      expect(queryAccessControlLists).toHaveBeenCalledWith({
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        descriptors: ALICE_ACL,
        includeExtendedInfo: true,
      });
      expect(results).toEqual([
        { bit: 2, name: "Edit", displayName: "Modify", state: "Allow" },
        { bit: 4, name: "Contribute", state: "Allow (inherited)" },
      ]);
    });

    it("summarizes to nothing when the entry is gone", async () => {
      const { planner } = makePlanner({ acls: [] });
      const results = await planner.summarizeReset({
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        descriptor: ALICE_ACL,
        permissions: 6,
        actions: [],
      });
      expect(results).toEqual([]);
    });
  });

  describe("delete", () => {
    const request = { namespaceId: NAMESPACE_ID, token: TOKEN, descriptor: ALICE_ACL };

    it("prepares the request for the identity descriptor", async () => {
      const { planner } = makePlanner();
      await expect(
        planner.prepareDelete({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN }),
      ).resolves.toEqual(request);
    });

    it("passes verification when only empty entries remain", async () => {
      const { planner } = makePlanner({
        acls: [{ token: TOKEN, acesDictionary: { [ALICE_ACL]: { allow: 0, deny: 0 } } }],
      });
      await expect(planner.verifyDeletion(request)).resolves.toBeUndefined();
    });

    it("fails verification when the descriptor still has permissions", async () => {
      const { planner } = makePlanner({
        acls: [{ token: TOKEN, acesDictionary: { [ALICE_ACL]: { allow: 1 } } }],
      });

      await expect(planner.verifyDeletion(request)).rejects.toMatchObject({
        code: "DependencyFailure",
        message: `descriptor "${ALICE_ACL}" still has permissions on token "${TOKEN}"`,
      });
    });
  });

  describe("read views", () => {
    it("shows labelled permissions for the subject", async () => {
      const { planner, queryAccessControlLists } = makePlanner({
        acls: [
          {
            token: TOKEN,
            inheritPermissions: true,
            acesDictionary: {
              [ALICE_ACL]: {
                descriptor: ALICE_ACL,
                allow: 1,
                deny: 0,
                extendedInfo: { effectiveAllow: 7, effectiveDeny: 0, inheritedAllow: 6, inheritedDeny: 0 },
              },
            },
          },
        ],
      });

      const view = await planner.showPermissions({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN });

      expect(queryAccessControlLists).toHaveBeenCalledWith({
        namespaceId: NAMESPACE_ID,
        token: TOKEN,
        descriptors: ALICE_ACL,
        includeExtendedInfo: true,
        recurse: true,
      });
      expect(view).toEqual({
        token: TOKEN,
        descriptor: ALICE_ACL,
        inheritPermissions: true,
        allow: ["Read"],
        deny: [],
        effectiveAllow: ["Contribute", "Edit", "Read"],
        effectiveDeny: [],
        inheritedAllow: ["Contribute", "Edit"],
        inheritedDeny: [],
      });
    });

    it("returns undefined when the subject has no entry", async () => {
      const { planner } = makePlanner({ acls: [] });
      await expect(
        planner.showPermissions({ subject: "alice@example.com", namespaceId: NAMESPACE_ID, token: TOKEN }),
      ).resolves.toBeUndefined();
    });

    it("lists every entry without a subject filter", async () => {
      const { planner, queryAccessControlLists } = makePlanner({
        acls: [{ token: TOKEN, acesDictionary: { [ALICE_ACL]: { allow: 1 } } }],
      });

      const records = await planner.listPermissions({ namespaceId: NAMESPACE_ID, recurse: true });

      expect(queryAccessControlLists).toHaveBeenCalledWith({
        namespaceId: NAMESPACE_ID,
        includeExtendedInfo: true,
        recurse: true,
      });
      expect(records).toEqual([{ token: TOKEN, descriptor: ALICE_ACL, allow: 1 }]);
    });

    it("describes a namespace", async () => {
      const { planner } = makePlanner();
      const [view] = await planner.describeNamespace(NAMESPACE_ID);
      expect(view.actionsCount).toBe(3);
      expect(view.actions?.[1]).toEqual({ bit: 2, bitHex: "0x2", name: "Edit", displayName: "Modify" });
    });

    it("lists namespaces sorted by name", async () => {
      const { planner, querySecurityNamespaces } = makePlanner();
      querySecurityNamespaces.mockResolvedValueOnce([
        { namespaceId: NAMESPACE_ID, name: "Git Repositories" },
        { namespaceId: "52d39943-cb85-4d7f-8fa8-c6baac873819", name: "analytics" },
        { namespaceId: "5ab15bc8-4ea1-d0f3-8344-cab8fe976877", name: "BoardsExternalIntegration" },
      ]);

      const views = await planner.listNamespaces({ localOnly: true });

      expect(querySecurityNamespaces).toHaveBeenCalledWith(undefined, { localOnly: true });
      expect(views.map((view) => view.name)).toEqual(["analytics", "BoardsExternalIntegration", "Git Repositories"]);
    });

    it("wraps namespace listing failures", async () => {
      const { planner } = makePlanner({ namespaceError: new Error("boom") });
      await expect(planner.listNamespaces()).rejects.toMatchObject({
        code: "DependencyFailure",
        message: "failed to query security namespaces: boom",
      });
    });
  });
});
