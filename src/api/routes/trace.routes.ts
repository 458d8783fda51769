import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { validateFen } from "chess.js";

import { TraceService } from "../../services/trace.service";
import { CapturedIncompleteError, DecodeError } from "../../report/errors";

const Body = z.object({
  fen: z.string().trim().min(1),
  moves: z.array(z.string().regex(/^\S+$/)).optional(),
  variant: z.string().regex(/^[\w-]+$/).optional(),
});

export default async function traceRoutes(f: FastifyInstance, service: TraceService) {
  // POST /api/v1/evaluate/trace — разобранная таблица трассировки оценки
  f.post("/api/v1/evaluate/trace", async (req, reply) => {
    const parsed = Body.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({
        error: "bad_request",
        message: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
    }

    const { fen, moves, variant } = parsed.data;

    // Для вариантов FEN свой, chess.js его не поймёт
    if (!variant || variant === "chess") {
      const check = validateFen(fen);
      if (!check.ok) {
        return reply.code(400).send({ error: "bad_request", message: check.error ?? "invalid fen" });
      }
    }

    try {
      const report = await service.trace({ fen, moves, variant });
      return reply.send(report);
    } catch (err) {
      if (err instanceof DecodeError) {
        f.log.warn({ err }, "trace decode failed");
        return reply.code(422).send({ error: err.code, message: err.message, raw: err.raw });
      }
      if (err instanceof CapturedIncompleteError) {
        f.log.warn({ err }, "trace capture incomplete");
        return reply.code(504).send({ error: err.code, message: err.message, lines: err.lines });
      }
      f.log.error({ err }, "trace failed");
      return reply.code(500).send({
        error: "trace_failed",
        message: err instanceof Error ? err.message : String(err),
      });
    }
  });
}
