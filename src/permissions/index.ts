export { cloneAccessControlEntry, cloneAceExtendedInfo } from "./ace-snapshot.js";
export {
  decodePermissionBits,
  decodePermissionLabels,
  encodePermissionBits,
  formatBitmaskHex,
} from "./bit-codec.js";
export {
  classifyPermissionStates,
  permissionResultLabel,
  summarizePermissions,
  type PermissionState,
  type PermissionStateInput,
  type PermissionStateResult,
} from "./state-classifier.js";
export {
  describeAccessControlEntry,
  describeDescriptorPermissions,
  extractDescriptorEntry,
  findAccessControlEntry,
  hasExplicitPermissions,
  listAccessControlEntries,
  type AccessControlEntryRecord,
  type FindAccessControlEntryParams,
  type PermissionEntryView,
} from "./access-control-lists.js";
export {
  extractNamespaceActions,
  transformNamespace,
  type NamespaceActionView,
  type NamespaceView,
} from "./namespace.js";
