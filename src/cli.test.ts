/**
 * Access CLI — Unit Tests
 */

import { Command } from "commander";
import { describe, it, expect, vi } from "vitest";
import { registerAccessCli, type AccessCliDeps } from "./cli.js";
import { IdentityResolver, SubjectDescriptorBridge } from "./identity/index.js";
import { PermissionRequestPlanner } from "./planner/index.js";
import type {
  AccessControlEntry,
  AccessControlEntryUpdate,
  AccessControlList,
  AccessControlWriter,
  DirectoryIdentity,
  ReadIdentitiesQuery,
  SecurityNamespaceDescription,
  SecurityNamespaceQueryOptions,
} from "./types.js";

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

type CliFixture = {
  acls?: AccessControlList[];
  removed?: boolean;
  confirmed?: boolean;
  namespaces?: SecurityNamespaceDescription[];
};

function makeCli(options: CliFixture = {}) {
  const directory = {
    readIdentities: vi.fn(async (query: ReadIdentitiesQuery) => {
      if (query.kind === "search" && query.searchFilter === "General" && query.filterValue === "alice@example.com") {
        return [alice];
      }
      if (query.kind === "subjectDescriptor" && query.subjectDescriptors === "aad.YWxpY2U") return [alice];
      return [];
    }),
  };
  const graph = {
    lookupSubjects: vi.fn(async () => ({
      "aad.YWxpY2U": { descriptor: "aad.YWxpY2U", displayName: "Alice", subjectKind: "user" },
    })),
    getDescriptor: vi.fn(async () => undefined),
  };
  const querySecurityNamespaces = vi.fn(
    async (_namespaceId?: string, _options?: SecurityNamespaceQueryOptions): Promise<SecurityNamespaceDescription[]> =>
      options.namespaces ?? [
        {
          namespaceId: NAMESPACE_ID,
          name: "Git Repositories",
          actions: [
            { bit: 1, name: "Read", displayName: "Read" },
            { bit: 2, name: "Edit", displayName: "Modify" },
            { bit: 4, name: "Contribute" },
          ],
        },
      ],
  );
  const namespaces = { querySecurityNamespaces };
  const acls = { queryAccessControlLists: vi.fn(async () => options.acls ?? []) };

  const setAccessControlEntries = vi.fn(
    async (_namespaceId: string, update: AccessControlEntryUpdate) => update.accessControlEntries,
  );
  const removeAccessControlEntries = vi.fn(
    async (_namespaceId: string, _token: string, _descriptors: string[]) => options.removed ?? true,
  );
  const removePermission = vi.fn(
    async (_namespaceId: string, _token: string, descriptor: string, _permissions: number) =>
      ({ descriptor }) satisfies AccessControlEntry,
  );
  const writer: AccessControlWriter = { setAccessControlEntries, removeAccessControlEntries, removePermission };

  const resolver = new IdentityResolver(directory);
  const bridge = new SubjectDescriptorBridge(resolver, graph);
  const planner = new PermissionRequestPlanner({ resolver, bridge, namespaces, acls });

  const lines: string[] = [];
  const errors: string[] = [];
  const confirm = vi.fn(async (_message: string) => options.confirmed ?? true);
  const deps: AccessCliDeps = { bridge, planner, writer, write: (line) => lines.push(line), confirm };

  const program = new Command();
  program.exitOverride().configureOutput({
    writeOut: () => undefined,
    writeErr: (text) => errors.push(text),
  });
  registerAccessCli(program, () => deps);

  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });

  return {
    run,
    lines,
    errors,
    confirm,
    querySecurityNamespaces,
    setAccessControlEntries,
    removeAccessControlEntries,
    removePermission,
  };
}

const target = ["--namespace-id", NAMESPACE_ID, "--token", TOKEN];

describe("registerAccessCli", () => {
  it("creates dependencies only when a command runs", () => {
    const getDeps = vi.fn();
    registerAccessCli(new Command(), getDeps);
    expect(getDeps).not.toHaveBeenCalled();
  });

  describe("member resolve", () => {
    it("prints the resolved graph subject as JSON", async () => {
      const cli = makeCli();
      await cli.run("member", "resolve", "alice@example.com");

      expect(cli.lines).toHaveLength(1);
      expect(JSON.parse(cli.lines[0] ?? "")).toEqual({
        descriptor: "aad.YWxpY2U",
        displayName: "Alice",
        subjectKind: "User",
      });
    });

    it("reports an unknown member and exits with code 1", async () => {
      const cli = makeCli();
      await expect(cli.run("member", "resolve", "nobody@example.com")).rejects.toMatchObject({ exitCode: 1 });
      expect(cli.errors).toEqual(['error: [NotFound] no identity found for "nobody@example.com"\n']);
    });
  });

  describe("namespace show", () => {
    it("prints the namespace views", async () => {
      const cli = makeCli();
      await cli.run("namespace", "show", NAMESPACE_ID);

      const views: unknown = JSON.parse(cli.lines[0] ?? "");
      expect(views).toMatchObject([{ namespaceId: NAMESPACE_ID, name: "Git Repositories", actionsCount: 3 }]);
    });
  });

  describe("namespace list", () => {
    it("prints the namespaces sorted by name", async () => {
      const cli = makeCli({
        namespaces: [
          { namespaceId: NAMESPACE_ID, name: "Git Repositories" },
          { namespaceId: "5ab15bc8-4ea1-d0f3-8344-cab8fe976877", name: "BoardsExternalIntegration" },
        ],
      });
      await cli.run("namespace", "list", "--local-only");

      expect(cli.querySecurityNamespaces).toHaveBeenCalledWith(undefined, { localOnly: true });
      const views: unknown = JSON.parse(cli.lines[0] ?? "");
      expect(views).toEqual([
        { namespaceId: "5ab15bc8-4ea1-d0f3-8344-cab8fe976877", name: "BoardsExternalIntegration" },
        { namespaceId: NAMESPACE_ID, name: "Git Repositories" },
      ]);
    });

    it("prints a notice when there are no namespaces", async () => {
      const cli = makeCli({ namespaces: [] });
      await cli.run("namespace", "list");

      expect(cli.querySecurityNamespaces).toHaveBeenCalledWith(undefined, { localOnly: false });
      expect(cli.lines).toEqual(["No security namespaces found."]);
    });
  });

  describe("permission show", () => {
    it("prints a notice when the subject has no entry", async () => {
      const cli = makeCli();
      await cli.run("permission", "show", "alice@example.com", ...target);
      expect(cli.lines).toEqual(["No permissions found."]);
    });

    it("rejects a missing token option", async () => {
      const cli = makeCli();
      await expect(
        cli.run("permission", "show", "alice@example.com", "--namespace-id", NAMESPACE_ID),
      ).rejects.toMatchObject({ code: "commander.missingMandatoryOptionValue" });
    });
  });

  describe("permission list", () => {
    it("prints raw entry records", async () => {
      const cli = makeCli({
        acls: [{ token: TOKEN, acesDictionary: { [ALICE_ACL]: { descriptor: ALICE_ACL, allow: 1, deny: 0 } } }],
      });
      await cli.run("permission", "list", "--namespace-id", NAMESPACE_ID);

      expect(JSON.parse(cli.lines[0] ?? "")).toEqual([{ token: TOKEN, descriptor: ALICE_ACL, allow: 1, deny: 0 }]);
    });
  });

  describe("permission update", () => {
    it("sends the encoded entry from repeated and comma separated flags", async () => {
      const cli = makeCli();
      await cli.run(
        "permission",
        "update",
        "alice@example.com",
        ...target,
        "--allow-bit",
        "Read",
        "--allow-bit",
        "Modify,Contribute",
      );

      expect(cli.setAccessControlEntries).toHaveBeenCalledWith(NAMESPACE_ID, {
        token: TOKEN,
        merge: false,
        accessControlEntries: [{ descriptor: ALICE_ACL, allow: 7 }],
      });
      expect(cli.confirm).toHaveBeenCalledWith(`Update permissions for "alice@example.com" on "${TOKEN}"?`);
      expect(cli.lines).toEqual(["Permissions updated."]);
    });

    it("skips the prompt with --yes", async () => {
      const cli = makeCli({ confirmed: false });
      await cli.run("permission", "update", "alice@example.com", ...target, "--allow-bit", "Read", "--yes");

      expect(cli.confirm).not.toHaveBeenCalled();
      expect(cli.setAccessControlEntries).toHaveBeenCalledTimes(1);
    });

    it("changes nothing when the prompt is declined", async () => {
      const cli = makeCli({ confirmed: false });
      await expect(
        cli.run("permission", "update", "alice@example.com", ...target, "--allow-bit", "Read"),
      ).rejects.toMatchObject({ exitCode: 2, code: "azdo-access.cancelled" });

      expect(cli.errors).toEqual(["cancelled\n"]);
      expect(cli.setAccessControlEntries).not.toHaveBeenCalled();
      expect(cli.lines).toEqual([]);
    });

    it("passes deny bits and the merge flag", async () => {
      const cli = makeCli();
      await cli.run("permission", "update", "alice@example.com", ...target, "--deny-bit", "Edit", "--merge");

      expect(cli.setAccessControlEntries).toHaveBeenCalledWith(NAMESPACE_ID, {
        token: TOKEN,
        merge: true,
        accessControlEntries: [{ descriptor: ALICE_ACL, deny: 2 }],
      });
    });

    it("fails without allow or deny bits", async () => {
      const cli = makeCli();
      await expect(cli.run("permission", "update", "alice@example.com", ...target)).rejects.toMatchObject({
        exitCode: 1,
      });
      expect(cli.errors).toEqual(["error: [InvalidInput] at least one of allow or deny must be provided\n"]);
      expect(cli.setAccessControlEntries).not.toHaveBeenCalled();
    });

    it("wraps a failed write", async () => {
      const cli = makeCli();
      cli.setAccessControlEntries.mockRejectedValueOnce(new Error("boom"));

      await expect(
        cli.run("permission", "update", "alice@example.com", ...target, "--allow-bit", "Read"),
      ).rejects.toMatchObject({ exitCode: 1 });
      expect(cli.errors).toEqual(["error: [DependencyFailure] failed to update permissions: boom\n"]);
    });
  });

  describe("permission reset", () => {
    it("removes the bits and prints the resulting states", async () => {
      const cli = makeCli({
        acls: [
          {
            token: TOKEN,
            acesDictionary: {
              [ALICE_ACL]: {
                descriptor: ALICE_ACL,
                allow: 1,
                deny: 0,
                extendedInfo: { effectiveAllow: 3, effectiveDeny: 0 },
              },
            },
          },
        ],
      });
      await cli.run("permission", "reset", "alice@example.com", ...target, "--permission-bit", "Edit");

      expect(cli.confirm).toHaveBeenCalledWith(`Reset permissions for "alice@example.com" on "${TOKEN}"?`);
      expect(cli.removePermission).toHaveBeenCalledWith(NAMESPACE_ID, TOKEN, ALICE_ACL, 2);
      expect(cli.lines).toEqual(["Modify: Allow (inherited)"]);
    });

    it("reports no change when the entry is gone", async () => {
      const cli = makeCli();
      await cli.run("permission", "reset", "alice@example.com", ...target, "--permission-bit", "Read,Contribute");

      expect(cli.removePermission).toHaveBeenCalledWith(NAMESPACE_ID, TOKEN, ALICE_ACL, 5);
      expect(cli.lines).toEqual(["No permissions changed."]);
    });

    it("does not reset when the prompt is declined", async () => {
      const cli = makeCli({ confirmed: false });
      await expect(
        cli.run("permission", "reset", "alice@example.com", ...target, "--permission-bit", "Read"),
      ).rejects.toMatchObject({ exitCode: 2 });
      expect(cli.removePermission).not.toHaveBeenCalled();
    });
  });

  describe("permission delete", () => {
    it("removes the entry and verifies it is gone", async () => {
      const cli = makeCli();
      await cli.run("permission", "delete", "alice@example.com", ...target);

      expect(cli.confirm).toHaveBeenCalledWith(`Delete permissions for "alice@example.com" on "${TOKEN}"?`);
      expect(cli.removeAccessControlEntries).toHaveBeenCalledWith(NAMESPACE_ID, TOKEN, [ALICE_ACL]);
      expect(cli.lines).toEqual(["Permissions deleted."]);
    });

    it("does not delete when the prompt is declined", async () => {
      const cli = makeCli({ confirmed: false });
      await expect(cli.run("permission", "delete", "alice@example.com", ...target)).rejects.toMatchObject({
        exitCode: 2,
      });
      expect(cli.removeAccessControlEntries).not.toHaveBeenCalled();
    });

    it("accepts -y to skip the prompt", async () => {
      const cli = makeCli({ confirmed: false });
      await cli.run("permission", "delete", "alice@example.com", ...target, "-y");

      expect(cli.confirm).not.toHaveBeenCalled();
      expect(cli.lines).toEqual(["Permissions deleted."]);
    });

    it("fails when the service does not confirm the removal", async () => {
      const cli = makeCli({ removed: false });
      await expect(cli.run("permission", "delete", "alice@example.com", ...target)).rejects.toMatchObject({
        exitCode: 1,
      });
      expect(cli.errors).toEqual([
        "error: [DependencyFailure] failed to delete permissions: service returned no confirmation\n",
      ]);
    });

    it("fails when explicit permissions remain", async () => {
      const cli = makeCli({
        acls: [{ token: TOKEN, acesDictionary: { [ALICE_ACL]: { descriptor: ALICE_ACL, allow: 1, deny: 0 } } }],
      });
      await expect(cli.run("permission", "delete", "alice@example.com", ...target)).rejects.toMatchObject({
        exitCode: 1,
      });
      expect(cli.errors).toEqual([
        `error: [DependencyFailure] descriptor "${ALICE_ACL}" still has permissions on token "${TOKEN}"\n`,
      ]);
      expect(cli.lines).toEqual([]);
    });
  });
});
