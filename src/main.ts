#!/usr/bin/env node
/**
 * `azdo-access` command line entry point.
 *
 * Configuration comes from the environment: AZDO_ORGANIZATION plus the
 * credential variables read by the credentials manager.
 */

import { Command } from "commander";
import { registerAccessCli } from "./cli.js";
import { formatErrorMessage } from "./retry.js";
import { createAccessToolkit } from "./toolkit.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("azdo-access")
  .description("Resolve Azure DevOps identities and manage security namespace permissions")
  .version(VERSION)
  .option("--debug", "Enable debug logging", false);

registerAccessCli(program, () => {
  const debug = program.opts<{ debug: boolean }>().debug;
  const toolkit = createAccessToolkit(debug ? { logging: { level: "debug" } } : {});
  return { bridge: toolkit.bridge, planner: toolkit.planner, writer: toolkit.client };
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`error: ${formatErrorMessage(err)}`);
  process.exitCode = 1;
});
