// src/harness/run.ts
// Прогон трассировки оценки по всем движкам каталога.
// Падение одного движка не останавливает остальные.

import type { Logger } from "pino";

import { log } from "../logger";
import { UciEngine, TraceParams } from "../engine/uci";
import { VariantDefinition, writeVariantsIni } from "../engine/variants";
import type { RawReport } from "../types/report";
import { DiscoveredEngine, discoverEngines } from "./discover";

export type HarnessEngine = Pick<
  UciEngine,
  "start" | "setOption" | "addVariant" | "position" | "trace" | "go" | "quit"
>;

export type HarnessVariant = {
  /** Куда записать описание вариантов */
  iniPath: string;
  definitions: VariantDefinition[];
  /** Вариант, который включить через UCI_Variant */
  select: string;
};

export type HarnessOptions = {
  enginesDir: string;
  fen: string;
  moves?: string[];
  variant?: HarnessVariant;
  trace?: TraceParams;
  /** После трассировки — короткий поиск на эту глубину (проверка, что движок живой) */
  searchDepth?: number;
  createEngine?: (path: string) => HarnessEngine;
  logger?: Logger;
};

type EngineRun = {
  report: RawReport;
  /** Есть, только если задан searchDepth */
  bestmove?: string;
};

export type HarnessResult =
  | ({ engine: DiscoveredEngine } & EngineRun)
  | { engine: DiscoveredEngine; error: Error };

async function traceOne(engine: HarnessEngine, opts: HarnessOptions): Promise<EngineRun> {
  try {
    await engine.start();
    if (opts.variant) {
      await engine.setOption("VariantPath", opts.variant.iniPath);
      engine.addVariant(opts.variant.select);
      await engine.setOption("UCI_Variant", opts.variant.select);
    }
    engine.position(opts.fen, opts.moves);
    const report = await engine.trace(opts.trace);
    if (opts.searchDepth === undefined) return { report };

    const search = await engine.go({ depth: opts.searchDepth });
    return { report, bestmove: search.bestmove };
  } finally {
    await engine.quit();
  }
}

export async function runHarness(opts: HarnessOptions): Promise<HarnessResult[]> {
  const logger = opts.logger ?? log.child({ mod: "harness" });
  const create = opts.createEngine ?? ((path: string) => new UciEngine(path));

  const engines = await discoverEngines(opts.enginesDir);
  if (engines.length === 0) {
    logger.warn({ dir: opts.enginesDir }, "no executable engines found");
    return [];
  }

  if (opts.variant) {
    await writeVariantsIni(opts.variant.iniPath, opts.variant.definitions);
  }

  const results: HarnessResult[] = [];
  for (const engine of engines) {
    try {
      const run = await traceOne(create(engine.path), opts);
      logger.info(
        { engine: engine.name, rows: Object.keys(run.report.table).length, bestmove: run.bestmove },
        "trace ok"
      );
      results.push({ engine, ...run });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ engine: engine.name, err: error }, "trace failed");
      results.push({ engine, error });
    }
  }
  return results;
}
