// Column helpers shared by the pg repositories. node-postgres hands back
// TIMESTAMPTZ as Date and BIGINT/COUNT as string.

import { isArch, type Arch } from "../../catalog/types.js";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids that would make a UUID column cast fail are treated as "no such row". */
export function isUuid(value: string): boolean {
  return UUID_RE.test(value);
}

export function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toIsoOrNull(value: Date | string | null): string | null {
  return value === null ? null : toIso(value);
}

export function toNumber(value: number | string): number {
  return typeof value === "number" ? value : Number(value);
}

export function toArch(value: string): Arch {
  if (!isArch(value)) throw new Error(`Unexpected arch in database: ${value}`);
  return value;
}
