import { chmod, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import pino from "pino";

import { HarnessEngine, runHarness } from "./run";
import type { GoParams } from "../engine/uci";
import type { RawReport } from "../types/report";

const REPORT: RawReport = {
  raw: "| Term | Total |\n| Material | 1 2 |\nFinal evaluation +0.01\n",
  table: { Material: { Total: { mg: 1, eg: 2 } } },
};

function fakeEngine(trace: () => Promise<RawReport>) {
  const calls: string[] = [];
  const engine: HarnessEngine = {
    start: vi.fn(async () => void calls.push("start")),
    setOption: vi.fn(async (name: string, value: string | number | boolean) => {
      calls.push(`setoption ${name}=${String(value)}`);
    }),
    addVariant: vi.fn((name: string) => void calls.push(`variant ${name}`)),
    position: vi.fn((fen: string) => void calls.push(`position ${fen}`)),
    trace: vi.fn(async () => {
      calls.push("trace");
      return trace();
    }),
    go: vi.fn(async (params?: GoParams) => {
      calls.push(`go depth ${String(params?.depth)}`);
      return { lines: ["bestmove e2e4"], bestmove: "e2e4" };
    }),
    quit: vi.fn(async () => void calls.push("quit")),
  };
  return { engine, calls };
}

describe.skipIf(process.platform === "win32")("runHarness", () => {
  const logger = pino({ level: "silent" });
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "evaltrace-harness-"));
    for (const name of ["alpha", "beta"]) {
      await writeFile(path.join(dir, name), "");
      await chmod(path.join(dir, name), 0o755);
    }
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("traces every engine and keeps going after a failure", async () => {
    const alpha = fakeEngine(async () => REPORT);
    const beta = fakeEngine(async () => {
      throw new Error("engine process exited");
    });
    const byPath: Record<string, HarnessEngine> = {
      [path.join(dir, "alpha")]: alpha.engine,
      [path.join(dir, "beta")]: beta.engine,
    };

    const results = await runHarness({
      enginesDir: dir,
      fen: "8/8/8/8/8/8/8/K6k w - - 0 1",
      createEngine: (p) => byPath[p],
      logger,
    });

    expect(results).toEqual([
      { engine: { name: "Alpha", path: path.join(dir, "alpha") }, report: REPORT },
      {
        engine: { name: "Beta", path: path.join(dir, "beta") },
        error: new Error("engine process exited"),
      },
    ]);
    expect(alpha.calls).toEqual(["start", "position 8/8/8/8/8/8/8/K6k w - - 0 1", "trace", "quit"]);
    expect(beta.calls.at(-1)).toBe("quit");
  });

  it("writes the variants file and selects the variant before tracing", async () => {
    const alpha = fakeEngine(async () => REPORT);
    const beta = fakeEngine(async () => REPORT);
    const engines = [alpha.engine, beta.engine];
    const iniPath = path.join(os.tmpdir(), `evaltrace-${process.pid}-variants.ini`);

    try {
      await runHarness({
        enginesDir: dir,
        fen: "1r4k1/5ppp/3Rb3/8/6r1/7K/7P/8 w - - 0 32",
        variant: {
          iniPath,
          select: "human",
          definitions: [{ name: "human", base: "chess", settings: { pieceValueMg: { r: 9000 } } }],
        },
        createEngine: () => engines.shift() ?? alpha.engine,
        logger,
      });

      expect(await readFile(iniPath, "utf8")).toBe("[human:chess]\npieceValueMg = r:9000\n");
      expect(alpha.calls.slice(0, 4)).toEqual([
        "start",
        `setoption VariantPath=${iniPath}`,
        "variant human",
        "setoption UCI_Variant=human",
      ]);
    } finally {
      await rm(iniPath, { force: true });
    }
  });

  it("runs a short search after the trace when a depth is given", async () => {
    const alpha = fakeEngine(async () => REPORT);
    const beta = fakeEngine(async () => REPORT);
    const engines = [alpha.engine, beta.engine];

    const results = await runHarness({
      enginesDir: dir,
      fen: "8/8/8/8/8/8/8/K6k w - - 0 1",
      searchDepth: 1,
      createEngine: () => engines.shift() ?? alpha.engine,
      logger,
    });

    expect(results[0]).toEqual({
      engine: { name: "Alpha", path: path.join(dir, "alpha") },
      report: REPORT,
      bestmove: "e2e4",
    });
    expect(alpha.calls.slice(-3)).toEqual(["trace", "go depth 1", "quit"]);
  });

  it("returns an empty list when no engine is found", async () => {
    const empty = await mkdtemp(path.join(os.tmpdir(), "evaltrace-empty-"));
    try {
      await expect(runHarness({ enginesDir: empty, fen: "x", logger })).resolves.toEqual([]);
    } finally {
      await rm(empty, { recursive: true, force: true });
    }
  });
});
