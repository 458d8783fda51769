import { describe, expect, it } from "vitest";
import pino from "pino";

import {
  INITIAL_CAPTURE_STATE,
  ReportCapture,
  stepCapture,
  type CaptureRules,
} from "./capture";
import { CapturedIncompleteError, DecodeError } from "./errors";
import type { LineTransport } from "../engine/transport";

class FakeTransport implements LineTransport {
  readonly sent: string[] = [];
  send(line: string): void {
    this.sent.push(line);
  }
}

/** Логгер, который складывает записи в массив */
function memoryLogger() {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    { write: (msg: string) => void records.push(JSON.parse(msg)) }
  );
  return { logger, records };
}

const RULES: CaptureRules = {
  startMarkers: ["info string variant"],
  terminatorPrefix: "Final",
};

const TRACE = [
  "info string variant chess startpos rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR",
  "|    Term    |    White    |    Black    |    Total    |",
  "|   Material |  ----  ---- |  ----  ---- |  0.43  0.51 |",
  "",
  "Final evaluation       +0.05 (white side)",
  "",
];

describe("stepCapture", () => {
  it("starts on a marker without buffering it", () => {
    const { state, event } = stepCapture(INITIAL_CAPTURE_STATE, "info string variant chess", RULES);
    expect(event).toEqual({ kind: "started" });
    expect(state).toEqual({ phase: "capturing", closing: false, buffer: [] });
  });

  it("reports an unrecognized line before the marker and keeps the state", () => {
    const { state, event } = stepCapture(INITIAL_CAPTURE_STATE, "id name Fake", RULES);
    expect(event).toEqual({ kind: "unrecognized", line: "id name Fake" });
    expect(state).toBe(INITIAL_CAPTURE_STATE);
  });

  it("ignores empty lines", () => {
    const capturing = { phase: "capturing" as const, closing: false, buffer: ["a"] };
    expect(stepCapture(capturing, "", RULES)).toEqual({
      state: capturing,
      event: { kind: "ignored" },
    });
  });

  it("buffers the terminator and finishes on the following line", () => {
    const capturing = { phase: "capturing" as const, closing: false, buffer: ["| row |"] };

    const closing = stepCapture(capturing, "Final evaluation 0.1", RULES);
    expect(closing.event).toEqual({ kind: "closing" });
    expect(closing.state).toEqual({
      phase: "capturing",
      closing: true,
      buffer: ["| row |", "Final evaluation 0.1"],
    });

    const finished = stepCapture(closing.state, "readyok", RULES);
    expect(finished.event).toEqual({ kind: "finished", raw: "| row |\nFinal evaluation 0.1\n" });
    expect(finished.state.phase).toBe("finished");
    expect(finished.state.buffer).toEqual(["| row |", "Final evaluation 0.1"]);
  });

  it("does not mutate the previous state", () => {
    const capturing = { phase: "capturing" as const, closing: false, buffer: ["a"] };
    stepCapture(capturing, "b", RULES);
    expect(capturing.buffer).toEqual(["a"]);
  });

  it("ignores everything once finished", () => {
    const finished = { phase: "finished" as const, closing: false, buffer: ["a"] };
    expect(stepCapture(finished, "info string variant chess", RULES).state).toBe(finished);
  });
});

describe("ReportCapture", () => {
  it("sends the command once and resolves the decoded report", async () => {
    const transport = new FakeTransport();
    const capture = new ReportCapture({ decoder: { sentinelPosition: "trailing" } });

    const result = capture.start(transport, "eval");
    TRACE.forEach((line) => capture.onLine(line));

    const report = await result;
    expect(transport.sent).toEqual(["eval"]);
    expect(report.raw).toBe(
      "|    Term    |    White    |    Black    |    Total    |\n" +
        "|   Material |  ----  ---- |  ----  ---- |  0.43  0.51 |\n" +
        "Final evaluation       +0.05 (white side)\n"
    );
    expect(report.table).toEqual({
      Material: {
        White: { mg: undefined, eg: undefined },
        Black: { mg: undefined, eg: undefined },
        Total: { mg: 0.43, eg: 0.51 },
      },
    });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.table.Material)).toBe(true);
    expect(capture.phase).toBe("finished");
  });

  it("logs engine chatter before the report and keeps going", async () => {
    const { logger, records } = memoryLogger();
    const capture = new ReportCapture({ logger });

    const result = capture.start(new FakeTransport(), "eval");
    capture.onLine("info string NNUE evaluation using nn.nnue enabled");
    TRACE.forEach((line) => capture.onLine(line));

    await expect(result).resolves.toHaveProperty("table.Material");
    const warnings = records.filter((r) => r.kind === "UnrecognizedLine");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].line).toBe("info string NNUE evaluation using nn.nnue enabled");
  });

  it("uses custom start markers and terminator", async () => {
    const capture = new ReportCapture({
      startMarkers: ["BEGIN"],
      terminatorPrefix: "END",
    });

    const result = capture.start(new FakeTransport(), "trace");
    for (const line of ["BEGIN", "| Term | Total |", "| Pawns | 1 2 |", "END", "next"]) {
      capture.onLine(line);
    }

    await expect(result).resolves.toEqual({
      raw: "| Term | Total |\n| Pawns | 1 2 |\nEND\n",
      table: { Pawns: { Total: { mg: 1, eg: 2 } } },
    });
  });

  it("ignores lines after the report is published", async () => {
    const capture = new ReportCapture();
    const result = capture.start(new FakeTransport(), "eval");
    TRACE.forEach((line) => capture.onLine(line));
    const report = await result;

    capture.onLine("| Extra | 1 1 | 1 1 | 1 1 |");
    capture.close();

    expect(report.raw).not.toContain("Extra");
    expect(capture.isPending).toBe(false);
  });

  it("fails with CapturedIncomplete when the stream closes early", async () => {
    const capture = new ReportCapture();
    const result = capture.start(new FakeTransport(), "eval");

    capture.onLine("info string variant chess");
    capture.onLine("| Term | White |");
    capture.onLine("| Pawns | 1 1 |");
    capture.onLine("| Kings | 2 2 |");
    capture.close();

    const err = await result.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CapturedIncompleteError);
    if (!(err instanceof CapturedIncompleteError)) return;
    expect(err.code).toBe("capture_incomplete");
    expect(err.lines).toEqual(["| Term | White |", "| Pawns | 1 1 |", "| Kings | 2 2 |"]);
  });

  it("finishes the report when the stream closes right after the terminator", async () => {
    const capture = new ReportCapture();
    const result = capture.start(new FakeTransport(), "eval");

    capture.onLine("info string variant chess");
    capture.onLine("| Term | White |");
    capture.onLine("| Pawns | 1 1 |");
    capture.onLine("Final evaluation +0.02");
    capture.close();

    await expect(result).resolves.toEqual({
      raw: "| Term | White |\n| Pawns | 1 1 |\nFinal evaluation +0.02\n",
      table: { Pawns: { White: { mg: 1, eg: 1 } } },
    });
    expect(capture.phase).toBe("finished");
  });

  it("fails with CapturedIncomplete when aborted", async () => {
    const controller = new AbortController();
    const capture = new ReportCapture({ signal: controller.signal });
    const result = capture.start(new FakeTransport(), "eval");

    capture.onLine("info string variant chess");
    controller.abort();

    await expect(result).rejects.toThrow("capture aborted");
    await expect(result).rejects.toBeInstanceOf(CapturedIncompleteError);
  });

  it("does not send the command when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new FakeTransport();

    const result = new ReportCapture({ signal: controller.signal }).start(transport, "eval");

    await expect(result).rejects.toBeInstanceOf(CapturedIncompleteError);
    expect(transport.sent).toEqual([]);
  });

  it("rejects with a DecodeError carrying the raw text", async () => {
    const capture = new ReportCapture();
    const result = capture.start(new FakeTransport(), "eval");

    for (const line of ["info string variant chess", "| Name | White |", "Final", ""]) {
      capture.onLine(line);
    }

    const err = await result.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DecodeError);
    if (!(err instanceof DecodeError)) return;
    expect(err.raw).toBe("| Name | White |\nFinal\n");
  });

  it("rejects when the transport cannot send", async () => {
    const transport: LineTransport = {
      send: () => {
        throw new Error("engine process is not running");
      },
    };

    await expect(new ReportCapture().start(transport, "eval")).rejects.toThrow(
      "engine process is not running"
    );
  });

  it("cannot be started twice", () => {
    const capture = new ReportCapture();
    void capture.start(new FakeTransport(), "eval").catch(() => undefined);
    expect(() => capture.start(new FakeTransport(), "eval")).toThrow("capture already started");
  });
});
