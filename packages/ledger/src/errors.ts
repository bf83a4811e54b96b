/**
 * Catalog error taxonomy.
 *
 * Every failure aborts its operation with full rollback; the code tells the
 * caller why. Collaborator failures that are not CatalogErrors are wrapped as
 * ExternalCallFailed with the original error as `cause`.
 */

export const CATALOG_ERROR_CODES = [
  "PermissionDenied",
  "WrongValue",
  "DuplicateContent",
  "ContentNotFound",
  "Unregistered",
  "ThresholdNotReached",
  "SubscriptionExpired",
  "TooEarly",
  "NothingToDistribute",
  "ExternalCallFailed",
  "CatalogClosed",
  "InvalidArgument",
] as const;

export type CatalogErrorCode = (typeof CATALOG_ERROR_CODES)[number];

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = "CatalogError";
    this.code = code;
  }
}

export function isCatalogError(err: unknown, code?: CatalogErrorCode): err is CatalogError {
  return err instanceof CatalogError && (code === undefined || err.code === code);
}

/**
 * Normalize a collaborator failure. CatalogErrors raised by a reentrant call
 * keep their code.
 */
export function externalFailure(err: unknown, what: string): CatalogError {
  if (err instanceof CatalogError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new CatalogError("ExternalCallFailed", `${what}: ${detail}`, { cause: err });
}
