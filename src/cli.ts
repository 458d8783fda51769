#!/usr/bin/env node
// src/cli.ts
// Харнесс: трассировка оценки каждым исполняемым движком из каталога.
//   evaltrace-harness [--dir ./engines] [--fen "<fen>"] [--variants variants.ini --variant human] [--depth 1]
import { parseArgs } from "node:util";
import { readFile } from "node:fs/promises";

import { loadConfig } from "./config";
import { log } from "./logger";
import { renderTable } from "./report/encode";
import { HarnessVariant, runHarness } from "./harness/run";
import type { VariantDefinition } from "./engine/variants";
import { z } from "zod";

const VariantFile = z.array(
  z.object({
    name: z.string().min(1),
    base: z.string().optional(),
    settings: z.record(
      z.union([z.string(), z.number(), z.boolean(), z.record(z.union([z.number(), z.string()]))])
    ),
  })
);

const Depth = z.coerce.number().int().min(1);

const DEFAULT_FEN = "1r4k1/5ppp/3Rb3/8/6r1/7K/7P/8 w - - 0 32";

async function loadVariant(iniPath: string, select: string, definitionsJson?: string): Promise<HarnessVariant> {
  // Определения берём из JSON; без него — пустая секция, наследующая chess
  const definitions: VariantDefinition[] = definitionsJson
    ? VariantFile.parse(JSON.parse(await readFile(definitionsJson, "utf8")))
    : [{ name: select, base: "chess", settings: {} }];
  return { iniPath, definitions, select };
}

async function main() {
  const config = loadConfig();
  log.level = config.logLevel;

  const { values } = parseArgs({
    options: {
      dir: { type: "string", default: config.enginesDir },
      fen: { type: "string", default: DEFAULT_FEN },
      variants: { type: "string" },
      variant: { type: "string" },
      definitions: { type: "string" },
      depth: { type: "string" },
    },
  });

  const searchDepth = values.depth === undefined ? undefined : Depth.parse(values.depth);

  const variant =
    values.variant && values.variants
      ? await loadVariant(values.variants, values.variant, values.definitions)
      : undefined;

  const results = await runHarness({
    enginesDir: values.dir ?? config.enginesDir,
    fen: values.fen ?? DEFAULT_FEN,
    variant,
    searchDepth,
    trace: {
      command: config.traceCommand,
      timeoutMs: config.traceTimeoutMs,
      ...config.capture,
      decoder: config.decoder,
    },
  });

  let failed = 0;
  for (const r of results) {
    if ("error" in r) {
      failed++;
      process.stdout.write(`[${r.engine.name}] FAILED: ${r.error.message}\n`);
      continue;
    }
    process.stdout.write(`[${r.engine.name}]\n${renderTable(r.report.table, config.decoder)}\n`);
    if (r.bestmove !== undefined) process.stdout.write(`bestmove ${r.bestmove}\n\n`);
  }

  process.exitCode = failed > 0 || results.length === 0 ? 1 : 0;
}

main().catch((err) => {
  log.fatal({ err }, "harness failed");
  process.exit(1);
});
