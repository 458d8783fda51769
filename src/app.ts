// src/app.ts
import Fastify, { FastifyInstance } from "fastify";

import { TraceService } from "./services/trace.service";
import traceRoutes from "./api/routes/trace.routes";
import enginesRoutes from "./api/routes/engines.routes";

export type AppDeps = {
  service: TraceService;
  enginesDir: string;
  /** false — без логов (тесты) */
  logLevel?: string | false;
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: deps.logLevel === false ? false : { level: deps.logLevel ?? "info" },
    // трассировка на медленном движке может идти долго
    requestTimeout: 0,
  });

  // Технические пинги
  fastify.get("/ping", async (_req, reply) => reply.send({ ok: true }));
  fastify.get("/health", async (_req, reply) => reply.send({ ok: true }));

  await fastify.register(async (f) => {
    await traceRoutes(f, deps.service);
    await enginesRoutes(f, { enginesDir: deps.enginesDir });
  });

  return fastify;
}
