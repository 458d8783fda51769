// src/config.ts
import "dotenv/config";
import { z } from "zod";

import type { CaptureOptions, DecoderOptions, HeaderSkip } from "./types/report";
import { DEFAULT_START_MARKERS, DEFAULT_TERMINATOR_PREFIX } from "./report/capture";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const Env = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  // 0.0.0.0 — доступ из контейнера/эмулятора
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  // Путь к движку (Windows exe по умолчанию на win32)
  ENGINE_PATH: z
    .string()
    .default(
      process.platform === "win32" ? "./engines/fairy-stockfish.exe" : "./engines/fairy-stockfish"
    ),
  ENGINES_DIR: z.string().default("./engines"),
  ENGINE_POOL_SIZE: z.coerce.number().int().min(1).default(1),
  ENGINE_THREADS: z.coerce.number().int().min(1).default(1),
  ENGINE_HASH: z.coerce.number().int().min(1).default(16),

  TRACE_COMMAND: z.string().min(1).default("eval"),
  TRACE_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  TRACE_START_MARKERS: z.string().optional(),
  TRACE_TERMINATOR: z.string().min(1).default(DEFAULT_TERMINATOR_PREFIX),

  TABLE_ROW_KEY: z.string().min(1).default("Term"),
  TABLE_HEADER_SKIP: z.enum(["0", "2"]).default("0").transform((v): HeaderSkip => (v === "2" ? 2 : 0)),
  TABLE_SENTINEL_POSITION: z.enum(["leading", "trailing"]).default("leading"),
  TABLE_STRICT_NUMERIC: flag.default("true"),
});

export type AppConfig = {
  port: number;
  host: string;
  logLevel: string;
  enginePath: string;
  enginesDir: string;
  poolSize: number;
  threads: number;
  hashMb: number;
  traceCommand: string;
  traceTimeoutMs: number;
  capture: Pick<CaptureOptions, "startMarkers" | "terminatorPrefix">;
  decoder: Required<Omit<DecoderOptions, "sentinel">>;
};

/** Бросает ZodError с перечнем кривых переменных */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = Env.parse(env);

  const markers = e.TRACE_START_MARKERS?.split(",")
    .map((m) => m.trim())
    .filter(Boolean);

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    enginePath: e.ENGINE_PATH,
    enginesDir: e.ENGINES_DIR,
    poolSize: e.ENGINE_POOL_SIZE,
    threads: e.ENGINE_THREADS,
    hashMb: e.ENGINE_HASH,
    traceCommand: e.TRACE_COMMAND,
    traceTimeoutMs: e.TRACE_TIMEOUT_MS,
    capture: {
      startMarkers: markers?.length ? markers : DEFAULT_START_MARKERS,
      terminatorPrefix: e.TRACE_TERMINATOR,
    },
    decoder: {
      headerSkip: e.TABLE_HEADER_SKIP,
      sentinelPosition: e.TABLE_SENTINEL_POSITION,
      strictNumeric: e.TABLE_STRICT_NUMERIC,
      rowKeyColumn: e.TABLE_ROW_KEY,
    },
  };
}
