// Device-facing endpoints. Admission outcomes are 200s; only protocol and
// store errors map to error statuses.

import type { ProtocolHandler } from "../omaha/handler.js";
import { guarded } from "./errors.js";
import type { RouteDefinition } from "./routes.js";

export function createOmahaRoutes(handler: ProtocolHandler): RouteDefinition[] {
  return [
    {
      method: "post",
      path: "/v1/update/check",
      handler: guarded("check-in", async (req, res) => {
        res.json(await handler.handleCheckIn(req.body, { ip: req.ip }));
      }),
    },
    {
      method: "post",
      path: "/v1/update/event",
      handler: guarded("event", async (req, res) => {
        res.json(await handler.handleEvent(req.body));
      }),
    },
  ];
}
