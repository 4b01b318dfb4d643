/**
 * Azure DevOps access configuration schema (TypeBox), defaults and
 * validation.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import { InvalidInputError } from "./errors.js";

export const configSchema = Type.Object({
  organization: Type.String({ minLength: 1, description: "Azure DevOps organization name" }),
  credentialMethod: Type.Optional(
    Type.Union(
      [
        Type.Literal("pat"),
        Type.Literal("default"),
        Type.Literal("cli"),
        Type.Literal("service-principal"),
        Type.Literal("managed-identity"),
      ],
      { description: "Credential method: pat | default | cli | service-principal | managed-identity" },
    ),
  ),
  personalAccessToken: Type.Optional(Type.String({ description: "Personal access token for pat auth" })),
  tenantId: Type.Optional(Type.String({ description: "Entra ID tenant for service principal auth" })),
  apiVersion: Type.Optional(Type.String({ description: "REST api-version for identity and security calls" })),
  retry: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
      minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      jitterFactor: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
    }),
  ),
  diagnostics: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
    }),
  ),
  logging: Type.Optional(
    Type.Object({
      level: Type.Optional(
        Type.Union([
          Type.Literal("trace"),
          Type.Literal("debug"),
          Type.Literal("info"),
          Type.Literal("warn"),
          Type.Literal("error"),
          Type.Literal("fatal"),
        ]),
      ),
    }),
  ),
  identityResolution: Type.Optional(
    Type.Object({
      ambiguityPolicy: Type.Optional(Type.Union([Type.Literal("first-signal"), Type.Literal("exhaustive")])),
    }),
  ),
});

export type AccessToolkitConfig = Static<typeof configSchema>;

export function getDefaultConfig(): Omit<AccessToolkitConfig, "organization"> {
  return {
    credentialMethod: "pat",
    apiVersion: "7.1",
    retry: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30000 },
    diagnostics: { enabled: false },
    logging: { level: "info" },
    identityResolution: { ambiguityPolicy: "first-signal" },
  };
}

/**
 * Validate a configuration object. Throws InvalidInput listing every schema
 * error.
 */
export function validateConfig(input: unknown): AccessToolkitConfig {
  if (Check(configSchema, input)) return input;

  const errors: string[] = [];
  for (const error of Errors(configSchema, input)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  throw new InvalidInputError(`invalid configuration: ${errors.join("; ")}`);
}

/**
 * Merge defaults, environment fallbacks and the given overrides, then
 * validate. `AZDO_ORGANIZATION` and `AZDO_PERSONAL_ACCESS_TOKEN` fill in
 * values the overrides leave out.
 */
export function resolveConfig(
  overrides: Partial<AccessToolkitConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AccessToolkitConfig {
  const defaults = getDefaultConfig();
  const merged: Record<string, unknown> = {
    ...defaults,
    ...overrides,
    retry: { ...defaults.retry, ...overrides.retry },
    diagnostics: { ...defaults.diagnostics, ...overrides.diagnostics },
    logging: { ...defaults.logging, ...overrides.logging },
    identityResolution: { ...defaults.identityResolution, ...overrides.identityResolution },
  };

  const organization = overrides.organization ?? env.AZDO_ORGANIZATION;
  if (organization !== undefined) merged.organization = organization.trim();
  const personalAccessToken = overrides.personalAccessToken ?? env.AZDO_PERSONAL_ACCESS_TOKEN;
  if (personalAccessToken) merged.personalAccessToken = personalAccessToken;

  return validateConfig(merged);
}
