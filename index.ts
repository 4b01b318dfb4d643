/**
 * Azure DevOps Access — Public API
 *
 * Identity resolution, permission bit codecs, ACL views and the permission
 * request planner, plus the REST client and toolkit wiring them together.
 */

export * from "./src/types.js";
export * from "./src/errors.js";
export * from "./src/identity/index.js";
export * from "./src/permissions/index.js";
export * from "./src/planner/index.js";
export * from "./src/credentials/index.js";
export * from "./src/logging/index.js";

export {
  DEFAULT_API_VERSION,
  GRAPH_API_VERSION,
  DevOpsApiError,
  DevOpsSecurityClient,
  createDevOpsSecurityClient,
  type DevOpsSecurityClientOptions,
} from "./src/devops/client.js";
export { configSchema, getDefaultConfig, resolveConfig, validateConfig, type AccessToolkitConfig } from "./src/config.js";
export { createAccessToolkit, type AccessToolkit, type AccessToolkitOptions } from "./src/toolkit.js";
export { registerAccessCli, type AccessCliDeps } from "./src/cli.js";
export {
  enableDevOpsDiagnostics,
  disableDevOpsDiagnostics,
  isDevOpsDiagnosticsEnabled,
  onDevOpsDiagnosticEvent,
  type DevOpsDiagnosticEvent,
  type DevOpsDiagnosticEventType,
  type DevOpsDiagnosticListener,
} from "./src/diagnostics.js";
export { formatErrorMessage, getErrorStatusCode, shouldRetryDevOpsError, withDevOpsRetry } from "./src/retry.js";
export { confirmOnTerminal, type Confirm } from "./src/prompter.js";
export { VERSION } from "./src/version.js";
