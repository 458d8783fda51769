// src/index.ts
import { loadConfig } from "./config";
import { log } from "./logger";
import { buildApp } from "./app";
import { EnginePool, createUciEngine } from "./engine/pool";
import { TraceService, TraceEngine } from "./services/trace.service";

// -------------------- Bootstrap --------------------
async function main() {
  const config = loadConfig();
  log.level = config.logLevel;

  // 1) Поднимаем пул движков ДО регистрации роутов
  const pool = new EnginePool<TraceEngine>({
    size: config.poolSize,
    create: () =>
      createUciEngine(config.enginePath, {
        Threads: config.threads,
        Hash: config.hashMb,
      }),
  });

  await pool.start();
  log.info({ engine: config.enginePath, size: pool.size }, "engine pool ready");

  // 2) Сервис трассировки
  const service = new TraceService(pool, {
    command: config.traceCommand,
    timeoutMs: config.traceTimeoutMs,
    ...config.capture,
    decoder: config.decoder,
  });

  // 3) Сервер
  const fastify = await buildApp({
    service,
    enginesDir: config.enginesDir,
    logLevel: config.logLevel,
  });
  await fastify.listen({ port: config.port, host: config.host });

  // 4) Грейсфул-шатдаун
  const shutdown = async (signal: string) => {
    try {
      fastify.log.info({ signal }, "Shutting down...");
      await fastify.close();
    } finally {
      try {
        await pool.stop();
      } catch (err) {
        log.warn({ err }, "engine pool stop failed");
      }
      process.exit(0);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  log.fatal({ err }, "startup failed");
  process.exit(1);
});
