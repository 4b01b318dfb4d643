/**
 * Security namespace catalogue helpers.
 */

import type { ActionDefinition, SecurityNamespaceDescription } from "../types.js";
import { formatBitmaskHex } from "./bit-codec.js";

const NIL_UUID = "00000000-0000-0000-0000-000000000000";

export type NamespaceActionView = {
  bit?: number;
  bitHex?: string;
  name?: string;
  displayName?: string;
  namespaceId?: string;
};

export type NamespaceView = {
  namespaceId: string;
  name?: string;
  displayName?: string;
  dataspaceCategory?: string;
  isRemotable?: boolean;
  extensionType?: string;
  elementLength?: number;
  separatorValue?: string;
  writePermission?: string;
  readPermission?: string;
  useTokenTranslator?: boolean;
  systemBitMask?: string;
  structureValue?: number;
  actionsCount?: number;
  actions?: NamespaceActionView[];
};

/**
 * Actions of the first namespace in a query result, copied.
 */
export function extractNamespaceActions(namespaces: readonly SecurityNamespaceDescription[] | undefined): ActionDefinition[] {
  const first = namespaces?.[0];
  if (!first?.actions) return [];
  return first.actions.map((action) => ({ ...action }));
}

/**
 * Export view of a namespace. Masks render as hex; empty strings and the nil
 * UUID on actions are dropped.
 */
export function transformNamespace(ns: SecurityNamespaceDescription): NamespaceView {
  const view: NamespaceView = { namespaceId: ns.namespaceId ?? "" };

  if (ns.name) view.name = ns.name;
  if (ns.displayName) view.displayName = ns.displayName;
  if (ns.dataspaceCategory) view.dataspaceCategory = ns.dataspaceCategory;
  if (ns.isRemotable !== undefined) view.isRemotable = ns.isRemotable;
  if (ns.extensionType) view.extensionType = ns.extensionType;
  if (ns.elementLength !== undefined) view.elementLength = ns.elementLength;
  if (ns.separatorValue) view.separatorValue = ns.separatorValue;
  if (ns.useTokenTranslator !== undefined) view.useTokenTranslator = ns.useTokenTranslator;
  if (ns.structureValue !== undefined) view.structureValue = ns.structureValue;

  if (ns.systemBitMask !== undefined) view.systemBitMask = formatBitmaskHex(ns.systemBitMask);
  if (ns.writePermission !== undefined) view.writePermission = formatBitmaskHex(ns.writePermission);
  if (ns.readPermission !== undefined) view.readPermission = formatBitmaskHex(ns.readPermission);

  if (ns.actions) {
    view.actions = ns.actions.map(transformAction);
    view.actionsCount = view.actions.length;
  }

  return view;
}

function transformAction(action: ActionDefinition): NamespaceActionView {
  const view: NamespaceActionView = {};

  if (action.bit !== undefined) {
    view.bit = action.bit;
    view.bitHex = formatBitmaskHex(action.bit);
  }
  if (action.name) view.name = action.name;
  if (action.displayName) view.displayName = action.displayName;
  if (action.namespaceId && action.namespaceId !== NIL_UUID) view.namespaceId = action.namespaceId;

  return view;
}
