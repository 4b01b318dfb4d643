/**
 * Azure DevOps Access — Error Types
 *
 * `NotFound` and `AmbiguousIdentity` are user-correctable outcomes and stay
 * distinguishable from `DependencyFailure`, which wraps collaborator errors.
 */

export type AccessControlErrorCode =
  | "InvalidInput"
  | "NotFound"
  | "AmbiguousIdentity"
  | "UndefinedPermissionBit"
  | "UnrecognizedPermissionToken"
  | "DependencyFailure";

export class AccessControlError extends Error {
  constructor(
    public readonly code: AccessControlErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AccessControlError";
  }
}

export class InvalidInputError extends AccessControlError {
  constructor(message: string) {
    super("InvalidInput", message);
    this.name = "InvalidInputError";
  }
}

export class NotFoundError extends AccessControlError {
  constructor(message: string) {
    super("NotFound", message);
    this.name = "NotFoundError";
  }
}

export class AmbiguousIdentityError extends AccessControlError {
  constructor(
    public readonly token: string,
    public readonly matchCount: number,
  ) {
    super("AmbiguousIdentity", `multiple identities found for "${token}"; specify a more specific identifier`);
    this.name = "AmbiguousIdentityError";
  }
}

export class UndefinedPermissionBitError extends AccessControlError {
  constructor(
    public readonly value: number,
    message?: string,
  ) {
    super("UndefinedPermissionBit", message ?? `permission bit value ${value} is not defined for this namespace`);
    this.name = "UndefinedPermissionBitError";
  }
}

export class UnrecognizedPermissionTokenError extends AccessControlError {
  constructor(public readonly token: string) {
    super("UnrecognizedPermissionToken", `unrecognized permission token "${token}"`);
    this.name = "UnrecognizedPermissionTokenError";
  }
}

export class DependencyFailureError extends AccessControlError {
  constructor(message: string, cause?: unknown) {
    super("DependencyFailure", cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = "DependencyFailureError";
  }
}

/**
 * Narrow an unknown error to an AccessControlError, optionally of one code.
 */
export function isAccessControlError(
  error: unknown,
  code?: AccessControlErrorCode,
): error is AccessControlError {
  if (!(error instanceof AccessControlError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Wrap a collaborator failure. Errors already in the taxonomy pass through.
 */
export function toDependencyFailure(message: string, error: unknown): AccessControlError {
  if (error instanceof AccessControlError) return error;
  return new DependencyFailureError(message, error);
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
