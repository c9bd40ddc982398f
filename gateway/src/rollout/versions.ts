// Dotted version comparison for package versions ("1.2.3", "2024.10.1",
// "3.0.0-rc.1"). Missing components count as zero; a prerelease sorts
// before its release.

interface ParsedVersion {
  parts: number[];
  prerelease: string;
}

function parseVersion(raw: string): ParsedVersion | null {
  const trimmed = raw.trim().replace(/^v/i, "");
  const match = /^(\d+(?:\.\d+)*)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/.exec(trimmed);
  if (!match) return null;
  return {
    parts: match[1].split(".").map((part) => Number.parseInt(part, 10)),
    prerelease: match[2] ?? "",
  };
}

function comparePrerelease(left: string, right: string): number {
  if (left === right) return 0;
  if (!left) return 1;
  if (!right) return -1;

  const leftParts = left.split(".");
  const rightParts = right.split(".");
  const length = Math.max(leftParts.length, rightParts.length);

  for (let i = 0; i < length; i++) {
    if (i >= leftParts.length) return -1;
    if (i >= rightParts.length) return 1;
    const l = leftParts[i];
    const r = rightParts[i];
    if (l === r) continue;

    const lNumeric = /^\d+$/.test(l);
    const rNumeric = /^\d+$/.test(r);
    if (lNumeric && rNumeric) return Number(l) < Number(r) ? -1 : 1;
    if (lNumeric !== rNumeric) return lNumeric ? -1 : 1;
    return l < r ? -1 : 1;
  }
  return 0;
}

/**
 * Returns -1, 0 or 1, or null when either side is not a dotted version
 * (callers then fall back to plain string equality).
 */
export function compareVersions(leftRaw: string, rightRaw: string): number | null {
  const left = parseVersion(leftRaw);
  const right = parseVersion(rightRaw);
  if (!left || !right) return null;

  const length = Math.max(left.parts.length, right.parts.length);
  for (let i = 0; i < length; i++) {
    const l = i < left.parts.length ? left.parts[i] : 0;
    const r = i < right.parts.length ? right.parts[i] : 0;
    if (l !== r) return l < r ? -1 : 1;
  }
  return comparePrerelease(left.prerelease, right.prerelease);
}
