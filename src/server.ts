import Fastify from "fastify";
import cors from "@fastify/cors";
import fastifyCookie from "@fastify/cookie";
import fastifySession from "@fastify/session";

import { buildFramework, type AppConfig } from "./config";
import { flashMessages } from "./flash/plugin";
import { healthRoutes } from "./routes/healthz";
import { messageRoutes } from "./routes/messages";
import { SESSION_TTL_MS, SqliteSessionStore } from "./session/sqlite_session_store";

export type BuildServerOptions = {
  logger?: boolean;
  // Overrides the SQLite session store (tests pass an in-memory one).
  sessionStore?: SqliteSessionStore;
};

export function buildServer(config: AppConfig, opts: BuildServerOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? true });

  // CORS (dev): permissive origin, credentials so the flash cookie travels.
  app.register(cors, { origin: true, credentials: true });

  // Flash first: its onSend hook must flush before @fastify/session saves.
  app.register(flashMessages, { framework: buildFramework(config) });

  if (config.backend.kind === "session") {
    const sessionBackend = config.backend;
    const store =
      opts.sessionStore ?? new SqliteSessionStore(sessionBackend.dbPath, { log: app.log });
    app.register(fastifyCookie);
    app.register(fastifySession, {
      secret: sessionBackend.secret,
      store,
      cookie: { secure: "auto", httpOnly: true, sameSite: "lax", maxAge: SESSION_TTL_MS },
    });
    app.addHook("onReady", async () => {
      store.startPruning(sessionBackend.pruneIntervalMs);
    });
    app.addHook("onClose", async () => {
      store.stopPruning();
      if (!opts.sessionStore) store.close();
    });
  }

  app.register(healthRoutes, { backend: config.backend.kind });
  app.register(messageRoutes);

  return app;
}
