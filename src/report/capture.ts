// src/report/capture.ts
// Захват отчёта из потока строк движка: not-started -> capturing -> finished.
// Каждый переход — чистая функция stepCapture(state, line).

import type { Logger } from "pino";
import { log } from "../logger";
import type { LineSink, LineTransport } from "../engine/transport";
import type {
  CaptureOptions,
  CaptureState,
  EvaluationTable,
  RawReport,
} from "../types/report";
import { decodeTable } from "./decode";
import { CapturedIncompleteError } from "./errors";

export const DEFAULT_START_MARKERS: readonly string[] = [
  "info string variant",
  "info string classical evaluation",
];
export const DEFAULT_TERMINATOR_PREFIX = "Final";

export const INITIAL_CAPTURE_STATE: CaptureState = {
  phase: "not-started",
  closing: false,
  buffer: [],
};

export type CaptureRules = {
  startMarkers: readonly string[];
  terminatorPrefix: string;
};

export type CaptureEvent =
  | { kind: "ignored" }
  | { kind: "started" }
  | { kind: "appended" }
  | { kind: "closing" }
  | { kind: "unrecognized"; line: string }
  | { kind: "finished"; raw: string };

export function joinBuffer(buffer: readonly string[]): string {
  return buffer.map((line) => `${line}\n`).join("");
}

/**
 * Один шаг автомата. Финализация откладывается на одну строку после терминатора:
 * сам терминатор попадает в буфер, а строка после него — нет.
 */
export function stepCapture(
  state: CaptureState,
  line: string,
  rules: CaptureRules
): { state: CaptureState; event: CaptureEvent } {
  if (state.phase === "finished") {
    return { state, event: { kind: "ignored" } };
  }

  if (state.closing) {
    return {
      state: { ...state, phase: "finished", closing: false },
      event: { kind: "finished", raw: joinBuffer(state.buffer) },
    };
  }

  if (line === "") return { state, event: { kind: "ignored" } };

  if (state.phase === "not-started") {
    if (rules.startMarkers.some((marker) => line.startsWith(marker))) {
      return { state: { ...state, phase: "capturing" }, event: { kind: "started" } };
    }
    return { state, event: { kind: "unrecognized", line } };
  }

  const closing = line.startsWith(rules.terminatorPrefix);
  return {
    state: { ...state, closing, buffer: [...state.buffer, line] },
    event: closing ? { kind: "closing" } : { kind: "appended" },
  };
}

type PendingReport = {
  resolve: (r: RawReport) => void;
  reject: (e: unknown) => void;
};

function freezeTable(table: EvaluationTable): EvaluationTable {
  for (const columns of Object.values(table)) {
    for (const score of Object.values(columns)) Object.freeze(score);
    Object.freeze(columns);
  }
  return Object.freeze(table);
}

/**
 * Один экземпляр — одна команда. start() отправляет команду и возвращает промис,
 * который разрешится RawReport или отклонится DecodeError / CapturedIncompleteError.
 */
export class ReportCapture implements LineSink {
  private state: CaptureState = INITIAL_CAPTURE_STATE;
  private readonly rules: CaptureRules;
  private readonly log: Logger;

  private pending: PendingReport | undefined;
  private started = false;

  constructor(private readonly options: CaptureOptions = {}) {
    this.rules = {
      startMarkers: options.startMarkers ?? DEFAULT_START_MARKERS,
      terminatorPrefix: options.terminatorPrefix ?? DEFAULT_TERMINATOR_PREFIX,
    };
    this.log = options.logger ?? log.child({ mod: "capture" });
  }

  get phase() {
    return this.state.phase;
  }

  /** Захват ещё ждёт строк */
  get isPending(): boolean {
    return this.pending !== undefined;
  }

  start(transport: LineTransport, command: string): Promise<RawReport> {
    if (this.started) {
      throw new Error("capture already started");
    }
    this.started = true;

    const result = new Promise<RawReport>((resolve, reject) => {
      this.pending = { resolve, reject };
    });

    const signal = this.options.signal;
    if (signal?.aborted) {
      this.cancel("capture canceled before start");
      return result;
    }
    signal?.addEventListener("abort", this.onAbort, { once: true });

    try {
      transport.send(command);
    } catch (err) {
      this.settle((p) => p.reject(err));
    }
    return result;
  }

  onLine(line: string): void {
    if (!this.pending) return;

    const { state, event } = stepCapture(this.state, line, this.rules);
    this.state = state;

    switch (event.kind) {
      case "unrecognized":
        this.log.warn({ kind: "UnrecognizedLine", line: event.line }, "Unexpected engine output");
        return;
      case "started":
        this.log.debug({ line }, "report capture started");
        return;
      case "finished":
        this.finalize(event.raw);
        return;
      default:
        return;
    }
  }

  /** Транспорт закрылся. Если терминатор уже в буфере, отчёт целый — разбираем его. */
  close(): void {
    if (this.pending && this.state.closing) {
      this.state = { ...this.state, phase: "finished", closing: false };
      this.finalize(joinBuffer(this.state.buffer));
      return;
    }
    this.incomplete("stream closed before the report finished");
  }

  cancel(reason = "capture canceled"): void {
    this.incomplete(reason);
  }

  private readonly onAbort = () => {
    this.cancel("capture aborted");
  };

  private incomplete(message: string) {
    const lines = this.state.buffer;
    this.settle((p) => p.reject(new CapturedIncompleteError(message, lines)));
  }

  private finalize(raw: string) {
    this.settle((p) => {
      try {
        const table = decodeTable(raw, this.options.decoder);
        p.resolve(Object.freeze({ raw, table: freezeTable(table) }));
      } catch (err) {
        this.log.warn({ err }, "report decode failed");
        p.reject(err);
      }
    });
  }

  /** Ровно одно завершение на команду */
  private settle(fn: (p: PendingReport) => void) {
    const p = this.pending;
    if (!p) return;
    this.pending = undefined;
    this.options.signal?.removeEventListener("abort", this.onAbort);
    fn(p);
  }
}
