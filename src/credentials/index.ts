export {
  AZURE_DEVOPS_SCOPE,
  DevOpsCredentialsManager,
  createCredentialsManager,
  type AuthorizationProvider,
  type DevOpsCredentialMethod,
  type DevOpsCredentialsOptions,
} from "./manager.js";
