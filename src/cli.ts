/**
 * Azure DevOps access CLI commands: member lookup, security namespace
 * inspection and permission show/list/update/reset/delete. Commands that
 * change an ACL ask for confirmation unless `--yes` is given.
 */

import type { Command } from "commander";
import { DependencyFailureError, toDependencyFailure } from "./errors.js";
import type { SubjectDescriptorBridge } from "./identity/index.js";
import { permissionResultLabel } from "./permissions/index.js";
import type { PermissionRequestPlanner } from "./planner/index.js";
import { confirmOnTerminal, type Confirm } from "./prompter.js";
import { formatErrorMessage } from "./retry.js";
import type { AccessControlWriter } from "./types.js";

export type AccessCliDeps = {
  bridge: SubjectDescriptorBridge;
  planner: PermissionRequestPlanner;
  writer: AccessControlWriter;
  /** Line writer for command output; console.log when omitted. */
  write?: (line: string) => void;
  /** Confirmation prompt for mutating commands; the terminal when omitted. */
  confirm?: Confirm;
};

type TargetOptions = { namespaceId: string; token: string };
type MutationOptions = TargetOptions & { yes: boolean };

class CancelledError extends Error {
  name = "CancelledError";

  constructor() {
    super("cancelled");
  }
}

// Repeatable flag that also accepts comma separated values.
function collectTokens(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(",")];
}

/**
 * Register the `member`, `namespace` and `permission` command groups.
 * Dependencies are created on first use so `--help` needs no configuration.
 */
export function registerAccessCli(program: Command, getDeps: () => AccessCliDeps): void {
  let deps: AccessCliDeps | undefined;
  const load = (): AccessCliDeps => (deps ??= getDeps());
  const print = (line: string): void => (load().write ?? console.log)(line);
  const printJson = (value: unknown): void => print(JSON.stringify(value, null, 2));

  const confirmOrCancel = async (skip: boolean, message: string): Promise<void> => {
    if (skip) return;
    if (!(await (load().confirm ?? confirmOnTerminal)(message))) throw new CancelledError();
  };

  const run =
    <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(...args);
      } catch (err) {
        if (err instanceof CancelledError) {
          program.error(err.message, { exitCode: 2, code: "azdo-access.cancelled" });
        }
        program.error(`error: ${formatErrorMessage(err)}`, { exitCode: 1 });
      }
    };

  // ---------------------------------------------------------------------------
  // member
  // ---------------------------------------------------------------------------

  const member = program.command("member").description("Identity and graph subject lookups");

  member
    .command("resolve <member>")
    .description("Resolve an email, account name, SID or descriptor to a graph subject")
    .action(
      run(async (value: string) => {
        printJson(await load().bridge.resolveSubject(value));
      }),
    );

  // ---------------------------------------------------------------------------
  // namespace
  // ---------------------------------------------------------------------------

  const namespace = program.command("namespace").description("Security namespaces");

  namespace
    .command("list")
    .alias("ls")
    .description("List the security namespaces of the organization, sorted by name")
    .option("--local-only", "Only namespaces defined locally within the organization", false)
    .action(
      run(async (opts: { localOnly: boolean }) => {
        const views = await load().planner.listNamespaces({ localOnly: opts.localOnly });
        if (views.length === 0) {
          print("No security namespaces found.");
          return;
        }
        printJson(views);
      }),
    );

  namespace
    .command("show <namespaceId>")
    .description("Show a security namespace and its permission actions")
    .action(
      run(async (namespaceId: string) => {
        printJson(await load().planner.describeNamespace(namespaceId));
      }),
    );

  // ---------------------------------------------------------------------------
  // permission
  // ---------------------------------------------------------------------------

  const permission = program.command("permission").description("Permissions of a subject on a security token");

  permission
    .command("show <subject>")
    .description("Show explicit, effective and inherited permissions")
    .requiredOption("--namespace-id <id>", "Security namespace id")
    .requiredOption("--token <token>", "Security token")
    .action(
      run(async (subject: string, opts: TargetOptions) => {
        const view = await load().planner.showPermissions({ subject, ...opts });
        if (!view) {
          print("No permissions found.");
          return;
        }
        printJson(view);
      }),
    );

  permission
    .command("list")
    .description("List access control entries in a namespace")
    .requiredOption("--namespace-id <id>", "Security namespace id")
    .option("--subject <subject>", "Only entries for this subject")
    .option("--token <token>", "Only entries on this token")
    .option("--recurse", "Include entries on child tokens", false)
    .action(
      run(async (opts: { namespaceId: string; subject?: string; token?: string; recurse: boolean }) => {
        const records = await load().planner.listPermissions(opts);
        if (records.length === 0) {
          print("No permissions found.");
          return;
        }
        printJson(records);
      }),
    );

  permission
    .command("update <subject>")
    .description("Set allow and deny bits for a subject")
    .requiredOption("--namespace-id <id>", "Security namespace id")
    .requiredOption("--token <token>", "Security token")
    .option("--allow-bit <bits>", "Permission name, display name or bit to allow (repeatable)", collectTokens, [])
    .option("--deny-bit <bits>", "Permission name, display name or bit to deny (repeatable)", collectTokens, [])
    .option("--merge", "Merge with the existing entry instead of replacing it", false)
    .option("-y, --yes", "Do not prompt for confirmation", false)
    .action(
      run(
        async (
          subject: string,
          opts: MutationOptions & { allowBit: string[]; denyBit: string[]; merge: boolean },
        ) => {
          const { planner, writer } = load();
          const request = await planner.prepareUpdate({
            subject,
            namespaceId: opts.namespaceId,
            token: opts.token,
            allow: opts.allowBit,
            deny: opts.denyBit,
            merge: opts.merge,
          });
          await confirmOrCancel(opts.yes, `Update permissions for "${subject.trim()}" on "${request.token}"?`);

          try {
            await writer.setAccessControlEntries(request.namespaceId, {
              token: request.token,
              merge: request.merge,
              accessControlEntries: request.entries,
            });
          } catch (err) {
            throw toDependencyFailure("failed to update permissions", err);
          }
          print("Permissions updated.");
        },
      ),
    );

  permission
    .command("reset <subject>")
    .description("Reset explicit bits so they fall back to inherited values")
    .requiredOption("--namespace-id <id>", "Security namespace id")
    .requiredOption("--token <token>", "Security token")
    .option("--permission-bit <bits>", "Permission to reset (repeatable)", collectTokens, [])
    .option("-y, --yes", "Do not prompt for confirmation", false)
    .action(
      run(async (subject: string, opts: MutationOptions & { permissionBit: string[] }) => {
        const { planner, writer } = load();
        const request = await planner.prepareReset({
          subject,
          namespaceId: opts.namespaceId,
          token: opts.token,
          permissions: opts.permissionBit,
        });
        await confirmOrCancel(opts.yes, `Reset permissions for "${subject.trim()}" on "${request.token}"?`);

        try {
          await writer.removePermission(request.namespaceId, request.token, request.descriptor, request.permissions);
        } catch (err) {
          throw toDependencyFailure("failed to reset permissions", err);
        }

        const results = await planner.summarizeReset(request);
        if (results.length === 0) {
          print("No permissions changed.");
          return;
        }
        for (const result of results) {
          print(`${permissionResultLabel(result)}: ${result.state}`);
        }
      }),
    );

  permission
    .command("delete <subject>")
    .description("Remove a subject's access control entry from a token")
    .requiredOption("--namespace-id <id>", "Security namespace id")
    .requiredOption("--token <token>", "Security token")
    .option("-y, --yes", "Do not prompt for confirmation", false)
    .action(
      run(async (subject: string, opts: MutationOptions) => {
        const { planner, writer } = load();
        const request = await planner.prepareDelete({ subject, namespaceId: opts.namespaceId, token: opts.token });
        await confirmOrCancel(opts.yes, `Delete permissions for "${subject.trim()}" on "${request.token}"?`);

        let removed: boolean;
        try {
          removed = await writer.removeAccessControlEntries(request.namespaceId, request.token, [request.descriptor]);
        } catch (err) {
          throw toDependencyFailure("failed to delete permissions", err);
        }
        if (!removed) {
          throw new DependencyFailureError("failed to delete permissions: service returned no confirmation");
        }

        await planner.verifyDeletion(request);
        print("Permissions deleted.");
      }),
    );
}
