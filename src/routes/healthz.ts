import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance, opts: { backend: string }) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "flash-mailbox",
    backend: opts.backend,
    ts: new Date().toISOString(),
  }));
}
