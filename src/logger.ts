// src/logger.ts
import pino from "pino";

export const log = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { srv: "evaltrace" },
});

export type { Logger } from "pino";
