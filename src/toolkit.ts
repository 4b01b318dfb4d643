/**
 * Azure DevOps Access Toolkit
 *
 * Wires configuration, credentials, the REST client, identity resolution
 * and the permission planner into one object sharing a single logger.
 */

import { resolveConfig, type AccessToolkitConfig } from "./config.js";
import { DevOpsCredentialsManager } from "./credentials/index.js";
import { DevOpsSecurityClient } from "./devops/client.js";
import { enableDevOpsDiagnostics } from "./diagnostics.js";
import { IdentityResolver, SubjectDescriptorBridge } from "./identity/index.js";
import { createLogger, type LogTransport, type Logger } from "./logging/index.js";
import { PermissionRequestPlanner } from "./planner/index.js";

export type AccessToolkit = {
  config: AccessToolkitConfig;
  logger: Logger;
  credentials: DevOpsCredentialsManager;
  client: DevOpsSecurityClient;
  resolver: IdentityResolver;
  bridge: SubjectDescriptorBridge;
  planner: PermissionRequestPlanner;
};

export type AccessToolkitOptions = {
  /** Log transports; console when omitted. */
  transports?: LogTransport[];
  /** Environment used for configuration fallbacks. */
  env?: NodeJS.ProcessEnv;
};

export function createAccessToolkit(
  config: Partial<AccessToolkitConfig> = {},
  options: AccessToolkitOptions = {},
): AccessToolkit {
  const resolved = resolveConfig(config, options.env);

  const logger = createLogger("toolkit", {
    level: resolved.logging?.level,
    organization: resolved.organization,
    redactPatterns: resolved.personalAccessToken ? [resolved.personalAccessToken] : [],
    transports: options.transports,
  });

  if (resolved.diagnostics?.enabled) {
    enableDevOpsDiagnostics();
  }

  const credentials = new DevOpsCredentialsManager({
    credentialMethod: resolved.credentialMethod,
    personalAccessToken: resolved.personalAccessToken,
    tenantId: resolved.tenantId,
  });

  const client = new DevOpsSecurityClient({
    organization: resolved.organization,
    credentials,
    apiVersion: resolved.apiVersion,
    retryOptions: resolved.retry,
    logger: logger.child("client"),
  });

  const resolver = new IdentityResolver(client, {
    logger: logger.child("resolver"),
    ambiguityPolicy: resolved.identityResolution?.ambiguityPolicy,
  });
  const bridge = new SubjectDescriptorBridge(resolver, client, { logger: logger.child("bridge") });
  const planner = new PermissionRequestPlanner({
    resolver,
    bridge,
    namespaces: client,
    acls: client,
    logger: logger.child("planner"),
  });

  logger.debug("access toolkit ready", {
    credentialMethod: credentials.getMethod(),
    ambiguityPolicy: resolved.identityResolution?.ambiguityPolicy,
  });

  return { config: resolved, logger, credentials, client, resolver, bridge, planner };
}
