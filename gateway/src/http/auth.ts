import crypto from "node:crypto";
import type { RouteRequest, RouteResponse } from "./routes.js";

export function tokenMatches(token: string, secret: string): boolean {
  const tokenBuf = Buffer.from(token);
  const secretBuf = Buffer.from(secret);
  return tokenBuf.length === secretBuf.length && crypto.timingSafeEqual(tokenBuf, secretBuf);
}

/** Bearer-token guard for /api/*. No secret configured = open (dev mode). */
export function requireAuth(secret: string | undefined) {
  return (req: Pick<RouteRequest, "headers">, res: RouteResponse, next: () => void): void => {
    if (!secret) return next();

    const authHeader = req.headers.authorization;
    if (typeof authHeader !== "string" || !authHeader.startsWith("Bearer ")) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    if (!tokenMatches(authHeader.slice(7), secret)) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }

    next();
  };
}
