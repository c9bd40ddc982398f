// Catalog value types: applications publish packages, channels point at one
// package, groups track one channel under a rollout policy.

export const ARCHES = ["all", "amd64", "aarch64", "x86"] as const;
export type Arch = (typeof ARCHES)[number];

export function isArch(value: unknown): value is Arch {
  return typeof value === "string" && (ARCHES as readonly string[]).includes(value);
}

export interface Application {
  id: string;
  name: string;
  description: string;
  createdAt: string;
}

export interface Package {
  id: string;
  applicationId: string;
  arch: Arch;
  version: string;
  url: string;
  filename: string;
  hash: string;
  size: number;
  /** Channel ids this package must never be assigned to. */
  channelsBlacklist: string[];
  createdAt: string;
}

export interface Channel {
  id: string;
  name: string;
  color: string;
  applicationId: string;
  arch: Arch;
  packageId: string | null;
  /** Package row as of read time; null when the channel points nowhere. */
  package: Package | null;
  createdAt: string;
}

export interface RolloutPolicy {
  updatesEnabled: boolean;
  maxUpdatesPerPeriod: number;
  periodIntervalMs: number;
  /** A grant with no event report for this long is treated as abandoned. */
  updateTimeoutMs: number;
  safeMode: boolean;
  /** Fraction in (0, 1]; the breaker trips when failures / outcomes exceeds it. */
  failureThreshold: number;
  failureMinSamples: number;
  failureWindowMs: number;
  officeHours: boolean;
  timezone: string;
}

export interface Group {
  id: string;
  name: string;
  applicationId: string;
  channelId: string;
  channel: Channel | null;
  policy: RolloutPolicy;
  createdAt: string;
}

export interface NewApplication {
  name: string;
  description?: string;
}

export interface NewPackage {
  applicationId: string;
  arch: string;
  version: string;
  url: string;
  filename?: string;
  hash?: string;
  size?: number;
  channelsBlacklist?: string[];
}

export interface NewChannel {
  applicationId: string;
  name: string;
  color?: string;
  arch: string;
  packageId?: string | null;
}

export interface NewGroup {
  applicationId: string;
  channelId: string;
  name: string;
  policy?: Partial<RolloutPolicy>;
}
