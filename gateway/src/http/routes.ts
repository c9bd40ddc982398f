// Route definitions are plain data so they can be mounted on an express
// router in server.ts and invoked directly in tests.

import type express from "express";

/** The parts of an express Request the handlers read. */
export interface RouteRequest {
  body: unknown;
  params: Record<string, string>;
  query: Record<string, unknown>;
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
}

export interface RouteResponse {
  status(code: number): RouteResponse;
  json(body: unknown): unknown;
}

export type RouteHandler = (req: RouteRequest, res: RouteResponse) => Promise<void>;

export type RouteMethod = "get" | "post" | "put" | "patch";

export interface RouteDefinition {
  method: RouteMethod;
  path: string;
  handler: RouteHandler;
}

export function mountRoutes(router: express.Router, routes: RouteDefinition[]): void {
  for (const route of routes) {
    const handle: express.RequestHandler = (req, res, next) => {
      route.handler(req, res).catch(next);
    };
    switch (route.method) {
      case "get": router.get(route.path, handle); break;
      case "post": router.post(route.path, handle); break;
      case "put": router.put(route.path, handle); break;
      case "patch": router.patch(route.path, handle); break;
    }
  }
}
