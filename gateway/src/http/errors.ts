import { CatalogError, type CatalogErrorCode } from "../catalog/errors.js";
import { logError, logWarn } from "../logging.js";
import { ProtocolError, type ProtocolErrorCode } from "../omaha/protocol.js";
import { StoreUnavailableError } from "../store/errors.js";
import type { RouteHandler, RouteRequest, RouteResponse } from "./routes.js";

const CATALOG_STATUS: Partial<Record<CatalogErrorCode, number>> = {
  NotFound: 404,
  NoRowsAffected: 409,
};

const PROTOCOL_STATUS: Record<ProtocolErrorCode, number> = {
  MalformedRequest: 400,
  UnexpectedEvent: 409,
  TransientConflict: 409,
};

/** Maps a thrown error to its HTTP response. Unknown errors become 500. */
export function sendError(res: RouteResponse, err: unknown, context: string): void {
  if (err instanceof CatalogError) {
    res.status(CATALOG_STATUS[err.code] ?? 400).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof ProtocolError) {
    logWarn("omaha", `${context}: ${err.code}: ${err.message}`);
    const body: Record<string, unknown> = { error: err.message, code: err.code };
    if (err.code === "TransientConflict") body.retryable = true;
    res.status(PROTOCOL_STATUS[err.code]).json(body);
    return;
  }

  if (err instanceof StoreUnavailableError) {
    logError("gateway", `${context}: ${err.message}`);
    res.status(503).json({ error: "Service unavailable", retryable: true });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  logError("gateway", `${context}: ${message}`);
  res.status(500).json({ error: message });
}

/** Wraps a handler so every thrown error goes through sendError. */
export function guarded(
  context: string,
  fn: (req: RouteRequest, res: RouteResponse) => Promise<unknown>,
): RouteHandler {
  return async (req, res) => {
    try {
      await fn(req, res);
    } catch (err) {
      sendError(res, err, context);
    }
  };
}
