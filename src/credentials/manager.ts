/**
 * Azure DevOps Credentials Manager
 *
 * Produces the Authorization header for Azure DevOps REST calls. Personal
 * access tokens are sent as Basic auth; every other method goes through an
 * @azure/identity credential and a bearer token for the Azure DevOps
 * resource.
 */

import type { TokenCredential } from "@azure/identity";
import { DependencyFailureError, InvalidInputError } from "../errors.js";

/** Azure DevOps resource scope for Entra ID tokens. */
export const AZURE_DEVOPS_SCOPE = "499b84ac-1321-427f-aa17-267ca6975798/.default";

// =============================================================================
// Types
// =============================================================================

export type DevOpsCredentialMethod = "pat" | "default" | "cli" | "service-principal" | "managed-identity";

export type DevOpsCredentialsOptions = {
  credentialMethod?: DevOpsCredentialMethod;
  personalAccessToken?: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
};

/** Anything that can authorize a request to Azure DevOps. */
export interface AuthorizationProvider {
  getAuthorizationHeader(): Promise<string>;
}

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<DevOpsCredentialMethod, { credential: TokenCredential; expiresAt: number }>();
  private ttlMs: number;

  constructor(ttlMs = 3_600_000) {
    this.ttlMs = ttlMs;
  }

  get(method: DevOpsCredentialMethod): TokenCredential | undefined {
    const entry = this.cache.get(method);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(method);
      return undefined;
    }
    return entry.credential;
  }

  set(method: DevOpsCredentialMethod, credential: TokenCredential): void {
    this.cache.set(method, { credential, expiresAt: Date.now() + this.ttlMs });
  }

  clear(): void {
    this.cache.clear();
  }
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class DevOpsCredentialsManager implements AuthorizationProvider {
  private options: DevOpsCredentialsOptions;
  private cache = new CredentialCache();

  constructor(options: DevOpsCredentialsOptions = {}) {
    this.options = {
      ...options,
      credentialMethod: options.credentialMethod ?? "pat",
      personalAccessToken: options.personalAccessToken ?? process.env.AZDO_PERSONAL_ACCESS_TOKEN,
      tenantId: options.tenantId ?? process.env.AZURE_TENANT_ID,
      clientId: options.clientId ?? process.env.AZURE_CLIENT_ID,
      clientSecret: options.clientSecret ?? process.env.AZURE_CLIENT_SECRET,
    };
  }

  getMethod(): DevOpsCredentialMethod {
    return this.options.credentialMethod ?? "pat";
  }

  async getAuthorizationHeader(): Promise<string> {
    const method = this.getMethod();

    if (method === "pat") {
      const pat = this.options.personalAccessToken?.trim();
      if (!pat) {
        throw new InvalidInputError("a personal access token is required for pat authentication");
      }
      return `Basic ${Buffer.from(`:${pat}`).toString("base64")}`;
    }

    const credential = await this.getCredential(method);
    const token = await credential.getToken(AZURE_DEVOPS_SCOPE);
    if (!token?.token) {
      throw new DependencyFailureError(`no access token returned for credential method "${method}"`);
    }
    return `Bearer ${token.token}`;
  }

  /**
   * Token credential for a non-PAT method, cached for an hour.
   */
  async getCredential(method: Exclude<DevOpsCredentialMethod, "pat">): Promise<TokenCredential> {
    const cached = this.cache.get(method);
    if (cached) return cached;

    const credential = await this.createCredential(method);
    this.cache.set(method, credential);
    return credential;
  }

  clearCache(): void {
    this.cache.clear();
  }

  // Dynamic import keeps @azure/identity off the PAT path.
  private async createCredential(method: Exclude<DevOpsCredentialMethod, "pat">): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential();

      case "service-principal": {
        const { tenantId, clientId, clientSecret } = this.options;
        if (!tenantId || !clientId || !clientSecret) {
          throw new InvalidInputError(
            "service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = this.options.clientId;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: DevOpsCredentialsOptions): DevOpsCredentialsManager {
  return new DevOpsCredentialsManager(options);
}
