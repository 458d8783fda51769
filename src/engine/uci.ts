// src/engine/uci.ts
import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import * as readline from "node:readline";
import type { Logger } from "pino";

import { log } from "../logger";
import { ReportCapture } from "../report/capture";
import type { CaptureOptions, RawReport } from "../types/report";
import type { LineTransport } from "./transport";

export type UciOptions = {
  /** Количество потоков */
  Threads?: number;
  /** Размер кеша (MB) */
  Hash?: number;
  /** Путь к файлу с описанием вариантов (.ini) */
  VariantPath?: string;
  /** Текущий вариант */
  UCI_Variant?: string;
  /** Любые дополнительные UCI-опции по имени */
  [name: string]: string | number | boolean | undefined;
};

export type TraceParams = Omit<CaptureOptions, "logger"> & {
  /** Команда, на которую движок печатает отчёт */
  command?: string;
  /** Жёсткий таймаут (ms): по истечении захват отменяется */
  timeoutMs?: number;
};

/** Минимум от процесса, который нужен движку. ChildProcess подходит как есть. */
export interface EngineProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly killed: boolean;
  kill(): boolean;
  once(event: "exit", listener: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnEngine = (path: string) => EngineProcess;

export type EngineSettings = {
  readyTimeoutMs?: number;
  spawn?: SpawnEngine;
  logger?: Logger;
};

export type GoParams = {
  depth?: number;
  movetime?: number;
  nodes?: number;
  /** Жёсткий таймаут (ms), по умолчанию movetime*2 либо 30s */
  timeoutMs?: number;
};

export type GoResult = {
  /** info-строки поиска и bestmove */
  lines: string[];
  bestmove: string;
  ponder?: string;
};

type ActiveGo = {
  resolve: (r: GoResult) => void;
  reject: (e: Error) => void;
  lines: string[];
  timeout: NodeJS.Timeout;
};

/** Описание опции из ответа на `uci` */
export type UciOptionInfo = {
  name: string;
  type: string;
  default?: string;
  vars: string[];
};

const DEFAULT_READY_TIMEOUT = 10_000;
const DEFAULT_TRACE_TIMEOUT = 30_000;
const DEFAULT_GO_TIMEOUT = 30_000;

const defaultSpawn: SpawnEngine = (path) =>
  spawn(path, [], {
    stdio: ["pipe", "pipe", "pipe"],
    windowsHide: true,
  });

export function buildSetOption(name: string, value: string | number | boolean) {
  return `setoption name ${name} value ${String(value)}`;
}

/** `option name UCI_Variant type combo default chess var chess var human` */
export function parseOptionLine(line: string): UciOptionInfo | undefined {
  const m = /^option name (.+?) type (\S+)(.*)$/.exec(line);
  if (!m) return undefined;

  const info: UciOptionInfo = { name: m[1], type: m[2], vars: [] };
  const t = m[3].trim().split(/\s+/).filter(Boolean);
  for (let i = 0; i < t.length; i++) {
    if (t[i] === "default" && i + 1 < t.length) {
      info.default = t[++i];
    } else if (t[i] === "var" && i + 1 < t.length) {
      info.vars.push(t[++i]);
    }
  }
  return info;
}

/** Нормализуем распространённые алиасы, если их передали в «человеческом» виде */
export function normalizeOptions(options: UciOptions): Record<string, string | number | boolean> {
  const normalized: Record<string, string | number | boolean> = {};
  for (const [k, v] of Object.entries(options)) {
    if (v === undefined) continue;
    switch (k) {
      case "threads":
      case "THREADS":
        normalized["Threads"] = Number(v);
        break;
      case "hash":
      case "hashMB":
      case "HASH":
        normalized["Hash"] = Number(v);
        break;
      case "variantPath":
      case "variantsIni":
        normalized["VariantPath"] = String(v);
        break;
      case "variant":
        normalized["UCI_Variant"] = String(v);
        break;
      default:
        normalized[k] = v;
    }
  }
  return normalized;
}

function safeKill(proc: EngineProcess, logger: Logger) {
  try {
    if (!proc.killed) proc.kill();
  } catch (err) {
    logger.warn({ err }, "engine kill failed");
  }
}

/**
 * Класс-обёртка для взаимодействия с UCI-движком.
 * Одна трассировка за раз: пока захват отчёта не завершён, вторая команда — ошибка.
 */
export class UciEngine implements LineTransport {
  private proc?: EngineProcess;
  private rl?: readline.Interface;

  private uciOk = false;
  private isQuitting = false;
  private exited = false;
  // ошибка запуска процесса (ENOENT, EACCES)
  private failure: Error | undefined;

  private pendingReadyResolvers: Array<() => void> = [];
  private readonly engineOptions = new Map<string, UciOptionInfo>();

  // Активный захват отчёта или поиск
  private activeCapture: ReportCapture | undefined;
  private activeGo: ActiveGo | undefined;

  private readonly readyTimeoutMs: number;
  private readonly spawnEngine: SpawnEngine;
  private readonly log: Logger;

  constructor(
    private readonly path: string,
    private readonly options: UciOptions = {},
    settings: EngineSettings = {}
  ) {
    this.readyTimeoutMs = settings.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT;
    this.spawnEngine = settings.spawn ?? defaultSpawn;
    this.log = (settings.logger ?? log).child({ mod: "uci", engine: path });
  }

  /**
   * Запуск процесса, uci-handshake, установка всех опций и isready.
   */
  async start(): Promise<void> {
    if (this.proc) return;

    const proc = this.spawnEngine(this.path);
    this.proc = proc;

    proc.stderr.on("data", (buf) => {
      this.log.warn({ stderr: String(buf).trimEnd() }, "engine stderr");
    });
    proc.stdin.on("error", (err) => this.log.warn({ err }, "engine stdin error"));
    proc.once("exit", () => this.onExit());
    proc.once("error", (err) => this.onError(err));

    this.rl = readline.createInterface({ input: proc.stdout });
    this.rl.on("line", (line) => this.onLine(line));
    // exit может прийти раньше последних строк stdout: захват закрываем по концу потока
    this.rl.on("close", () => this.onStreamEnd());

    this.send("uci");

    // Ожидаем uciok
    await this.waitFor(() => this.uciOk, this.readyTimeoutMs, "uci handshake timeout");

    // Применяем все опции
    for (const [name, value] of Object.entries(normalizeOptions(this.options))) {
      this.send(buildSetOption(name, value));
    }

    await this.isReady();
  }

  /** Опции, объявленные движком при рукопожатии */
  getOption(name: string): UciOptionInfo | undefined {
    return this.engineOptions.get(name);
  }

  async setOption(name: string, value: string | number | boolean): Promise<void> {
    const info = this.engineOptions.get(name);
    if (info?.type === "combo" && !info.vars.includes(String(value))) {
      throw new Error(`engine option ${name} has no choice "${String(value)}"`);
    }
    this.send(buildSetOption(name, value));
    await this.isReady();
  }

  /**
   * Добавить вариант к списку UCI_Variant (если движок о нём ещё не знает).
   * Сам вариант должен быть описан в файле VariantPath.
   */
  addVariant(name: string): void {
    const info = this.engineOptions.get("UCI_Variant");
    if (!info) {
      this.engineOptions.set("UCI_Variant", { name: "UCI_Variant", type: "combo", vars: [name] });
      return;
    }
    if (!info.vars.includes(name)) info.vars.push(name);
  }

  /**
   * Сигнал новой партии.
   */
  async newGame(): Promise<void> {
    this.send("ucinewgame");
    await this.isReady();
  }

  /**
   * Гарантирует готовность движка (isready/readyok).
   */
  async isReady(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const done = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.pendingReadyResolvers = this.pendingReadyResolvers.filter((r) => r !== done);
        reject(new Error("isready timeout"));
      }, this.readyTimeoutMs);
      this.pendingReadyResolvers.push(done);
      this.send("isready");
    });
  }

  /**
   * Установка позиции по FEN и (опционально) списку ходов UCI.
   */
  position(fen: string, moves?: string[]): void {
    const suffix = moves?.length ? ` moves ${moves.join(" ")}` : "";
    this.send(`position fen ${fen}${suffix}`);
  }

  /**
   * Отправить команду трассировки (по умолчанию `eval`) и дождаться разобранного отчёта.
   * Параллельный вызов второй трассировки приведёт к исключению.
   */
  async trace(params: TraceParams = {}): Promise<RawReport> {
    if (this.activeCapture) {
      throw new Error("trace is already running");
    }
    if (this.activeGo) {
      throw new Error("search is running");
    }

    const { command = "eval", timeoutMs = DEFAULT_TRACE_TIMEOUT, ...captureOptions } = params;
    const capture = new ReportCapture({
      ...captureOptions,
      logger: this.log.child({ mod: "capture" }),
    });

    // По таймауту отменяем захват, результат — CapturedIncompleteError
    const timeout = setTimeout(() => capture.cancel(`trace timeout after ${timeoutMs}ms`), timeoutMs);

    this.activeCapture = capture;
    try {
      return await capture.start(this, command);
    } finally {
      clearTimeout(timeout);
      if (this.activeCapture === capture) this.activeCapture = undefined;
    }
  }

  /**
   * Запуск поиска. Возвращает все info-строки и bestmove.
   * Во время поиска трассировка недоступна, и наоборот.
   */
  async go(params: GoParams = {}): Promise<GoResult> {
    if (this.activeGo) {
      throw new Error("go is already running");
    }
    if (this.activeCapture) {
      throw new Error("trace is already running");
    }

    const cmd: string[] = ["go"];
    if (params.depth !== undefined) cmd.push("depth", String(params.depth));
    if (params.movetime !== undefined) cmd.push("movetime", String(params.movetime));
    if (params.nodes !== undefined) cmd.push("nodes", String(params.nodes));

    const goTimeout =
      params.timeoutMs ??
      (params.movetime ? Math.max(params.movetime * 2, 5_000) : DEFAULT_GO_TIMEOUT);

    return new Promise<GoResult>((resolve, reject) => {
      const state: ActiveGo = {
        resolve,
        reject,
        lines: [],
        timeout: setTimeout(() => this.failGo(new Error("go timeout"), true), goTimeout),
      };
      this.activeGo = state;
      try {
        this.send(cmd.join(" "));
      } catch (err) {
        this.failGo(err instanceof Error ? err : new Error(String(err)), false);
      }
    });
  }

  /**
   * Корректное завершение процесса.
   */
  async quit(): Promise<void> {
    const proc = this.proc;
    if (!proc || this.isQuitting) return;
    this.isQuitting = true;

    if (!this.exited) {
      const EXIT_TIMEOUT = 2_000;
      const exitPromise = new Promise<void>((resolve) => proc.once("exit", () => resolve()));
      const timeout = setTimeout(() => safeKill(proc, this.log), EXIT_TIMEOUT);

      // Попробуем корректно
      if (proc.stdin.writable) proc.stdin.write("quit\n");

      await exitPromise;
      clearTimeout(timeout);
    }

    this.rl?.close();
  }

  send(cmd: string): void {
    if (!this.proc || this.exited || !this.proc.stdin.writable) {
      throw new Error("engine process is not running");
    }
    this.log.trace({ cmd }, "> engine");
    this.proc.stdin.write(cmd + "\n");
  }

  // ===== Внутренняя кухня =====

  private onLine(lineRaw: string) {
    // пустые строки нужны захвату: после "Final evaluation" движок печатает пустую строку
    const line = lineRaw.trimEnd();
    this.log.trace({ line }, "< engine");

    if (line === "uciok") {
      this.uciOk = true;
      return;
    }

    if (line.startsWith("option name ")) {
      const info = parseOptionLine(line);
      if (info) this.engineOptions.set(info.name, info);
      return;
    }

    if (line === "readyok") {
      const resolvers = this.pendingReadyResolvers.splice(0);
      resolvers.forEach((r) => r());
    }

    // Сбор телеметрии поиска
    if (this.activeGo) {
      this.onSearchLine(this.activeGo, line);
      return;
    }

    this.activeCapture?.onLine(line);
  }

  private onSearchLine(go: ActiveGo, line: string) {
    if (line.startsWith("info ")) {
      go.lines.push(line);
      return;
    }
    if (!line.startsWith("bestmove")) return;

    go.lines.push(line);
    const parts = line.split(/\s+/);
    const ponderIndex = parts.indexOf("ponder");

    clearTimeout(go.timeout);
    this.activeGo = undefined;
    go.resolve({
      lines: go.lines,
      bestmove: parts[1] ?? "",
      ponder: ponderIndex >= 0 ? parts[ponderIndex + 1] : undefined,
    });
  }

  /** stopSearch — по таймауту просим движок остановиться */
  private failGo(err: Error, stopSearch: boolean) {
    const go = this.activeGo;
    if (!go) return;
    this.activeGo = undefined;
    clearTimeout(go.timeout);
    if (stopSearch && !this.exited) {
      try {
        this.send("stop");
      } catch (sendErr) {
        this.log.warn({ err: sendErr }, "engine stop failed");
      }
    }
    go.reject(err);
  }

  private onExit() {
    this.exited = true;
    if (!this.isQuitting) this.log.warn("engine process exited");
  }

  private onError(err: Error) {
    this.failure = err;
    this.exited = true;
    this.log.error({ err }, "engine process failed");
    this.activeCapture?.close();
    this.failGo(err, false);
  }

  private onStreamEnd() {
    this.activeCapture?.close();
    this.failGo(new Error("engine process exited"), false);
  }

  private async waitFor(cond: () => boolean, timeoutMs: number, msg: string) {
    const start = Date.now();
    while (!cond()) {
      if (this.exited) throw this.failure ?? new Error("engine process exited");
      if (Date.now() - start > timeoutMs) {
        throw new Error(msg);
      }
      await new Promise((r) => setTimeout(r, 10));
    }
  }
}
