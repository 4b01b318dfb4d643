/**
 * Response schemas for the Azure DevOps identity, graph and security APIs.
 *
 * Only the fields the toolkit reads are declared; everything else the
 * service returns is allowed through.
 */

import { Type, type TSchema } from "@sinclair/typebox";

const OptionalString = Type.Optional(Type.String());
const OptionalNumber = Type.Optional(Type.Number());
const OptionalBoolean = Type.Optional(Type.Boolean());

export const IdentitySchema = Type.Object({
  id: OptionalString,
  descriptor: OptionalString,
  subjectDescriptor: OptionalString,
  providerDisplayName: OptionalString,
  isContainer: OptionalBoolean,
  properties: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const GraphSubjectSchema = Type.Object({
  descriptor: OptionalString,
  displayName: OptionalString,
  subjectKind: OptionalString,
  origin: OptionalString,
  originId: OptionalString,
  legacyDescriptor: OptionalString,
});

export const ActionDefinitionSchema = Type.Object({
  bit: OptionalNumber,
  name: OptionalString,
  displayName: OptionalString,
  namespaceId: OptionalString,
});

export const SecurityNamespaceSchema = Type.Object({
  namespaceId: OptionalString,
  name: OptionalString,
  displayName: OptionalString,
  dataspaceCategory: OptionalString,
  isRemotable: OptionalBoolean,
  extensionType: OptionalString,
  elementLength: OptionalNumber,
  separatorValue: OptionalString,
  writePermission: OptionalNumber,
  readPermission: OptionalNumber,
  useTokenTranslator: OptionalBoolean,
  systemBitMask: OptionalNumber,
  structureValue: OptionalNumber,
  actions: Type.Optional(Type.Array(ActionDefinitionSchema)),
});

export const AccessControlEntrySchema = Type.Object({
  descriptor: OptionalString,
  allow: OptionalNumber,
  deny: OptionalNumber,
  extendedInfo: Type.Optional(
    Type.Object({
      effectiveAllow: OptionalNumber,
      effectiveDeny: OptionalNumber,
      inheritedAllow: OptionalNumber,
      inheritedDeny: OptionalNumber,
    }),
  ),
});

export const AccessControlListSchema = Type.Object({
  token: OptionalString,
  inheritPermissions: OptionalBoolean,
  acesDictionary: Type.Optional(Type.Record(Type.String(), AccessControlEntrySchema)),
});

/** `{ count, value: T[] }` collection envelope. */
export const ListEnvelope = <T extends TSchema>(item: T) =>
  Type.Object({ count: OptionalNumber, value: Type.Array(item) });

/** `{ value: T }` single-value envelope. */
export const ValueEnvelope = <T extends TSchema>(item: T) => Type.Object({ value: item });

export const IdentityListSchema = ListEnvelope(IdentitySchema);
export const SecurityNamespaceListSchema = ListEnvelope(SecurityNamespaceSchema);
export const AccessControlListListSchema = ListEnvelope(AccessControlListSchema);
export const AccessControlEntryListSchema = ListEnvelope(AccessControlEntrySchema);
export const SubjectLookupSchema = ValueEnvelope(Type.Record(Type.String(), GraphSubjectSchema));
export const GraphDescriptorSchema = ValueEnvelope(Type.String());
export const RemovalResultSchema = Type.Union([Type.Boolean(), ValueEnvelope(Type.Boolean())]);
