export type CatalogErrorCode =
  | "InvalidPackage"
  | "ArchMismatch"
  | "BlacklistedChannel"
  | "InvalidArch"
  | "InvalidChannel"
  | "InvalidPolicy"
  | "InvalidInput"
  | "NotFound"
  | "NoRowsAffected";

const DEFAULT_MESSAGES: Record<CatalogErrorCode, string> = {
  InvalidPackage: "package does not belong to the channel's application",
  ArchMismatch: "package architecture does not match the channel",
  BlacklistedChannel: "package has blacklisted this channel",
  InvalidArch: "unknown architecture",
  InvalidChannel: "channel does not belong to the group's application",
  InvalidPolicy: "invalid rollout policy",
  InvalidInput: "invalid input",
  NotFound: "not found",
  NoRowsAffected: "no rows affected",
};

/** Validation failures raised by the catalog before data reaches the engine. */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message?: string) {
    super(message ?? DEFAULT_MESSAGES[code]);
    this.name = "CatalogError";
    this.code = code;
  }
}
