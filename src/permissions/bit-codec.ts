/**
 * Permission bit codec.
 *
 * Encodes user-supplied permission tokens (hex, decimal, action name,
 * display name or "Bit <n>") into a bitmask validated against a namespace's
 * action catalogue, and decodes bitmasks back into sorted action labels.
 */

import {
  InvalidInputError,
  UndefinedPermissionBitError,
  UnrecognizedPermissionTokenError,
} from "../errors.js";
import type { ActionDefinition } from "../types.js";

const MAX_BIT_VALUE = 0x7fffffff;
const HEX_BODY = /^[0-9a-fA-F]+$/;
const DECIMAL = /^[+-]?\d+$/;

/**
 * Render a mask as `0x` + upper-case hex of its unsigned 32-bit value.
 */
export function formatBitmaskHex(mask: number): string {
  return `0x${(mask >>> 0).toString(16).toUpperCase()}`;
}

function synthesizedName(bit: number): string {
  return `Bit ${bit}`;
}

function catalogue(actions: readonly ActionDefinition[]): { names: Map<string, number>; allowedMask: number } {
  const names = new Map<string, number>();
  let allowedMask = 0;

  for (const action of actions) {
    const bit = action.bit ?? 0;
    if (bit === 0) continue;

    allowedMask |= bit;

    const name = action.name?.trim();
    if (name) names.set(name.toLowerCase(), bit);
    const displayName = action.displayName?.trim();
    if (displayName) names.set(displayName.toLowerCase(), bit);
    names.set(synthesizedName(bit).toLowerCase(), bit);
  }

  return { names, allowedMask };
}

function checkAllowed(value: number, allowedMask: number): void {
  if (value === 0) {
    throw new UndefinedPermissionBitError(value, "permission bit value cannot be zero");
  }
  if (value < 0) {
    throw new UndefinedPermissionBitError(value);
  }
  if (allowedMask !== 0 && (value & ~allowedMask) !== 0) {
    throw new UndefinedPermissionBitError(value);
  }
}

function parseDecimal(token: string): number | undefined {
  if (!DECIMAL.test(token)) return undefined;
  const value = Number.parseInt(token, 10);
  if (value > MAX_BIT_VALUE || value < -MAX_BIT_VALUE - 1) return undefined;
  return value;
}

/**
 * Encode permission tokens into a bitmask.
 *
 * Tokens are already split on commas. Empty tokens are skipped. With an
 * empty catalogue only numeric tokens are accepted and no subset check is
 * made. Any invalid token fails the whole call.
 */
export function encodePermissionBits(actions: readonly ActionDefinition[], tokens: readonly string[]): number {
  const { names, allowedMask } = catalogue(actions);
  let mask = 0;

  for (const raw of tokens) {
    const token = raw.trim();
    if (!token) continue;

    if (token.startsWith("0x") || token.startsWith("0X")) {
      const body = token.slice(2);
      const value = HEX_BODY.test(body) ? Number.parseInt(body, 16) : Number.NaN;
      if (Number.isNaN(value) || value > MAX_BIT_VALUE) {
        throw new InvalidInputError(`invalid bit value "${token}"`);
      }
      checkAllowed(value, allowedMask);
      mask |= value;
      continue;
    }

    const decimal = parseDecimal(token);
    if (decimal !== undefined) {
      checkAllowed(decimal, allowedMask);
      mask |= decimal;
      continue;
    }

    const bit = names.get(token.toLowerCase());
    if (bit === undefined) {
      throw new UnrecognizedPermissionTokenError(token);
    }
    mask |= bit;
  }

  return mask;
}

/**
 * Sorted labels for the bits in `mask`. Bits no action claims are collected
 * into one `Unknown (0x…)` label. A mask no action matches at all decodes
 * to its hex literal. Returns `[]` for a zero mask.
 */
export function decodePermissionLabels(actions: readonly ActionDefinition[], mask: number): string[] {
  if (mask === 0) return [];
  if (actions.length === 0) return [formatBitmaskHex(mask)];

  let matched = 0;
  const labels: string[] = [];

  for (const action of actions) {
    const bit = action.bit ?? 0;
    if (bit === 0 || (mask & bit) !== bit) continue;

    matched |= bit;
    labels.push(action.name?.trim() || action.displayName?.trim() || synthesizedName(bit));
  }

  if (matched === 0) return [formatBitmaskHex(mask)];

  if (matched !== mask) {
    labels.push(`Unknown (${formatBitmaskHex(mask & ~matched)})`);
  }

  return labels.sort();
}

/**
 * Human-readable description of a bitmask: "None", a hex literal, or the
 * sorted labels joined with ", ".
 */
export function decodePermissionBits(actions: readonly ActionDefinition[], mask: number): string {
  if (mask === 0) return "None";
  return decodePermissionLabels(actions, mask).join(", ");
}
