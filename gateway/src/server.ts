import http from "node:http";
import express from "express";
import cors from "cors";
import { WebSocketServer, WebSocket } from "ws";
import { createCatalogAdmin } from "./catalog/admin.js";
import { loadConfig } from "./config/loader.js";
import { close as closeDb } from "./db/client.js";
import { createAdminRoutes } from "./http/admin-routes.js";
import { requireAuth, tokenMatches } from "./http/auth.js";
import { sendError } from "./http/errors.js";
import { createHealthRoutes } from "./http/health-routes.js";
import { createOmahaRoutes } from "./http/omaha-routes.js";
import { mountRoutes } from "./http/routes.js";
import { log as writeLog, logDebug, persistLogToDb, pruneLogs, setLogBroadcast, setLogPersistence } from "./logging.js";
import { startMaintenance } from "./maintenance/scheduler.js";
import { createProtocolHandler } from "./omaha/handler.js";
import { frame, parseFrame, type FrameType, type SystemStatusData } from "./protocol.js";
import { createMemoryStore } from "./store/memory.js";
import { createPgStore } from "./store/pg/index.js";

const VERSION = "0.1.0";

const config = loadConfig();
const usePostgres = config.store.driver === "postgres";
const persistedLogs = usePostgres && config.store.persistLogs;

const store = usePostgres ? createPgStore() : createMemoryStore();
if (persistedLogs) setLogPersistence(persistLogToDb);

// ─── Live feed ───

const clients = new Set<WebSocket>();

function wsBroadcast(type: FrameType, data: unknown): void {
  const msg = frame(type, data);
  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(msg);
    }
  }
}

setLogBroadcast(wsBroadcast);

const handler = createProtocolHandler({ store, broadcast: wsBroadcast });
const admin = createCatalogAdmin({ store, defaults: config.rollout, broadcast: wsBroadcast });

// ─── HTTP ───

const app = express();
const server = http.createServer(app);

if (config.gateway.trustProxy) app.set("trust proxy", true);
app.use(cors({ origin: config.gateway.corsOrigins }));
app.use(express.json({ limit: "256kb" }));

app.use((req, res, next) => {
  // Health checks and WS upgrades are too noisy to log
  if (req.path.startsWith("/health") || req.headers.upgrade === "websocket") {
    return next();
  }
  const start = Date.now();
  res.on("finish", () => {
    writeLog("access", `${req.method} ${req.path} ${res.statusCode}`, {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: Date.now() - start,
      ip: req.ip || req.socket.remoteAddress,
      userAgent: req.headers["user-agent"],
    });
  });
  next();
});

const auth = requireAuth(config.gateway.secret);
app.use("/api", (req, res, next) => auth(req, res, next));

const router = express.Router();
mountRoutes(router, [
  ...createHealthRoutes(store),
  ...createOmahaRoutes(handler),
  ...createAdminRoutes({ store, admin, persistedLogs }),
]);
app.use(router);

const onError: express.ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Malformed JSON body", code: "MalformedRequest" });
    return;
  }
  sendError(res, err, `${req.method} ${req.path}`);
};
app.use(onError);

// ─── WebSocket ───

const wss = new WebSocketServer({ noServer: true });

server.on("upgrade", (req, socket, head) => {
  if (req.url && !req.url.startsWith("/ws")) {
    socket.destroy();
    return;
  }

  const secret = config.gateway.secret;
  if (secret) {
    // Authorization header first, then ?token= for browsers
    let token: string | null = null;
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith("Bearer ")) {
      token = authHeader.slice(7);
    } else {
      const url = new URL(req.url || "/", `http://${req.headers.host}`);
      token = url.searchParams.get("token");
    }

    if (!token || !tokenMatches(token, secret)) {
      socket.write("HTTP/1.1 401 Unauthorized\r\n\r\n");
      socket.destroy();
      return;
    }
  }

  wss.handleUpgrade(req, socket, head, (ws) => {
    wss.emit("connection", ws, req);
  });
});

wss.on("connection", (ws) => {
  clients.add(ws);
  logDebug("gateway", `WS client connected (${clients.size} total)`);

  const status: SystemStatusData = { driver: store.driver, version: VERSION, clients: clients.size };
  ws.send(frame("system.status", status));

  ws.on("message", (raw) => {
    const msg = parseFrame(raw.toString());
    if (msg?.type === "system.ping") ws.send(frame("system.pong", undefined, msg.id));
  });

  ws.on("close", () => {
    clients.delete(ws);
    logDebug("gateway", `WS client disconnected (${clients.size} total)`);
  });
});

// ─── Start ───

const maintenance = startMaintenance({
  store,
  config: config.maintenance,
  pruneLogs: persistedLogs ? pruneLogs : undefined,
});

const { port, host } = config.gateway;

server.listen(port, host, () => {
  writeLog("gateway", `Fleetcast gateway v${VERSION} listening on http://${host}:${port} (store: ${store.driver})`);
});

async function shutdown(): Promise<void> {
  writeLog("gateway", "Shutting down...");
  maintenance?.stop();
  setLogBroadcast(null);
  setLogPersistence(null);
  for (const client of clients) client.close();
  wss.close();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (usePostgres) await closeDb();
}

process.on("SIGINT", () => {
  shutdown().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    },
  );
});
