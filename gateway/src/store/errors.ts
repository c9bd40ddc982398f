/** An optimistic write lost against a concurrent writer of the same row. */
export class StaleWriteError extends Error {
  readonly instanceId: string;

  constructor(instanceId: string) {
    super(`Stale write for instance ${instanceId}`);
    this.name = "StaleWriteError";
    this.instanceId = instanceId;
  }
}

/** The backing database could not be reached; requests fail with 503. */
export class StoreUnavailableError extends Error {
  constructor(cause: unknown) {
    super(`Store unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StoreUnavailableError";
  }
}
