import type { FastifyInstance } from "fastify";
import { discoverEngines } from "../../harness/discover";

export default async function enginesRoutes(f: FastifyInstance, opts: { enginesDir: string }) {
  f.get("/api/v1/engines", async (_req, reply) => {
    try {
      const engines = await discoverEngines(opts.enginesDir);
      return reply.send({ engines });
    } catch (err) {
      f.log.error({ err }, "engine discovery failed");
      return reply.code(500).send({
        error: "discovery_failed",
        message: err instanceof Error ? err.message : String(err),
      });
    }
  });
}
