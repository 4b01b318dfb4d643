export { classifySubjectToken, isDescriptor, isSecurityIdentifier, type SubjectTokenKind } from "./classifier.js";
export { determineSearchFilters } from "./search-filters.js";
export {
  IdentityResolver,
  createIdentityResolver,
  IDENTITY_DESCRIPTOR_PREFIX,
  type IdentityResolverOptions,
} from "./resolver.js";
export { SubjectDescriptorBridge, createSubjectBridge, identitySubjectKind } from "./subject-bridge.js";
