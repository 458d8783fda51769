// src/report/decode.ts
// Разбор ASCII-таблицы трассировки оценки (строки вида "| Term | White | ... |").
// Один декодер на все форматы: различия задаются DecoderOptions.

import type {
  DecoderOptions,
  EvaluationTable,
  ScorePair,
  SentinelPosition,
} from "../types/report";
import { CellParseError, DecodeError, DuplicateRowKeyError } from "./errors";

export const TABLE_DELIMITER = "|";

export const DEFAULT_DECODER_OPTIONS: Required<DecoderOptions> = {
  headerSkip: 0,
  sentinelPosition: "leading",
  strictNumeric: true,
  rowKeyColumn: "Term",
  sentinel: "-",
};

/** Ячейки из одних линеек (---, ===, +:+) — оформление */
const RULE_CELL = /^[-=+:]*$/;

export function resolveDecoderOptions(options: DecoderOptions = {}): Required<DecoderOptions> {
  const resolved: Required<DecoderOptions> = {
    headerSkip: options.headerSkip ?? DEFAULT_DECODER_OPTIONS.headerSkip,
    sentinelPosition: options.sentinelPosition ?? DEFAULT_DECODER_OPTIONS.sentinelPosition,
    strictNumeric: options.strictNumeric ?? DEFAULT_DECODER_OPTIONS.strictNumeric,
    rowKeyColumn: options.rowKeyColumn ?? DEFAULT_DECODER_OPTIONS.rowKeyColumn,
    sentinel: options.sentinel ?? DEFAULT_DECODER_OPTIONS.sentinel,
  };
  if ([...resolved.sentinel].length !== 1) {
    throw new RangeError(`sentinel must be a single character, got "${resolved.sentinel}"`);
  }
  return resolved;
}

/** "| a |  b  c |" -> ["a", "b c"]. Пустые края от внешних `|` отбрасываются. */
export function splitCells(line: string): string[] {
  const parts = line.trim().split(TABLE_DELIMITER);
  parts.shift();
  if (parts.length > 0 && parts[parts.length - 1].trim() === "") parts.pop();
  return parts.map((cell) => cell.trim().replace(/\s+/g, " "));
}

function isSentinel(token: string, sentinel: string, position: SentinelPosition): boolean {
  if (position === "trailing") return token.endsWith(sentinel);
  // "-3.0" — число, а "-" и "----" — пусто
  return token.startsWith(sentinel) && !/^[\d.]/.test(token.slice(sentinel.length));
}

function parseToken(token: string, cell: string, opts: Required<DecoderOptions>): number | undefined {
  if (isSentinel(token, opts.sentinel, opts.sentinelPosition)) return undefined;
  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new CellParseError(cell, `"${token}" is not a number`);
  }
  return value;
}

/**
 * Разобрать ячейку "mg eg" в ScorePair.
 * Бросает CellParseError, если токенов не два или токен не число.
 */
export function parseScore(cell: string, options: DecoderOptions = {}): ScorePair {
  const opts = resolveDecoderOptions(options);
  const tokens = cell.trim().split(/\s+/).filter(Boolean);
  if (tokens.length !== 2) {
    throw new CellParseError(cell, `expected 2 values, got ${tokens.length}`);
  }
  return {
    mg: parseToken(tokens[0], cell, opts),
    eg: parseToken(tokens[1], cell, opts),
  };
}

/** Одна логическая строка: ключ + значения по позициям (пустые сохраняются) */
type LogicalRow = {
  key: string;
  values: string[];
};

type Layout = {
  header: string[];
  body: string[][];
  rowKeyIndex: number;
  valueKeys: string[];
};

function locateHeader(rows: string[][], opts: Required<DecoderOptions>, raw: string): Layout {
  let headerIndex: number;
  if (opts.headerSkip === 2) {
    if (rows.length < 3) {
      throw new DecodeError("header row missing after the two leading rows", raw);
    }
    headerIndex = 2;
    if (!rows[2].includes(opts.rowKeyColumn)) {
      throw new DecodeError(`row-key column "${opts.rowKeyColumn}" absent from header`, raw);
    }
  } else {
    if (rows.length === 0) throw new DecodeError("no table rows found", raw);
    headerIndex = rows.findIndex((cells) => cells.includes(opts.rowKeyColumn));
    if (headerIndex < 0) {
      throw new DecodeError(`row-key column "${opts.rowKeyColumn}" absent from header`, raw);
    }
  }

  const header = rows[headerIndex];
  if (header.some((key) => key === "")) {
    throw new DecodeError("header contains an empty column key", raw);
  }
  if (new Set(header).size !== header.length) {
    throw new DecodeError(`header repeats a column key: ${header.join(", ")}`, raw);
  }

  const rowKeyIndex = header.indexOf(opts.rowKeyColumn);
  return {
    header,
    body: rows.slice(headerIndex + 1),
    rowKeyIndex,
    valueKeys: header.filter((_, i) => i !== rowKeyIndex),
  };
}

function withoutIndex(cells: string[], index: number): string[] {
  return cells.filter((_, i) => i !== index);
}

function isScoreToken(token: string, opts: Required<DecoderOptions>): boolean {
  return isSentinel(token, opts.sentinel, opts.sentinelPosition) || Number.isFinite(Number(token));
}

/** Ячейка вида "mg eg": своего ключа строки в ней быть не может */
function isScoreCell(cell: string, opts: Required<DecoderOptions>): boolean {
  const tokens = cell.split(" ").filter(Boolean);
  return tokens.length === 2 && tokens.every((t) => isScoreToken(t, opts));
}

/**
 * Короткая строка и следующая за ней — куски одной строки, разрезанной по границе ячейки:
 * вместе они дают ширину заголовка, ключ в первом куске, во втором одни значения.
 */
function isSplitRow(
  cells: string[],
  next: string[] | undefined,
  layout: Layout,
  opts: Required<DecoderOptions>
): next is string[] {
  const { header, rowKeyIndex } = layout;
  return (
    next !== undefined &&
    cells.length < header.length &&
    cells.length + next.length === header.length &&
    rowKeyIndex < cells.length &&
    cells[rowKeyIndex] !== "" &&
    next.every((cell) => isScoreCell(cell, opts))
  );
}

/**
 * Строка шире заголовка: значения не влезли в одну строку и перенесены на следующую.
 * Половины одной формы выравниваются друг по другу, ключ берётся у той, где он есть.
 * Ключа нет нигде, ключ в обеих, разная форма — DecodeError.
 */
function mergeWrapped(first: string[], second: string[], layout: Layout, raw: string): LogicalRow {
  const { rowKeyIndex } = layout;
  const shown = `"${first.join(" | ")}"`;

  if (first.length !== second.length) {
    throw new DecodeError(`cannot align continuation row after ${shown}`, raw);
  }

  const firstKey = first[rowKeyIndex];
  const secondKey = second[rowKeyIndex];
  if (!firstKey && !secondKey) {
    throw new DecodeError(`continuation pair ${shown} carries no row key`, raw);
  }
  if (firstKey && secondKey) {
    throw new DecodeError(`continuation pair ${shown} carries two row keys`, raw);
  }

  return {
    key: firstKey || secondKey,
    values: [...withoutIndex(first, rowKeyIndex), ...withoutIndex(second, rowKeyIndex)],
  };
}

function toRow(cells: string[], rowKeyIndex: number): LogicalRow {
  // у короткой строки ячейки ключа может не быть вовсе
  const key = rowKeyIndex < cells.length ? cells[rowKeyIndex] : "";
  return { key, values: withoutIndex(cells, rowKeyIndex) };
}

function collectRows(layout: Layout, opts: Required<DecoderOptions>, raw: string): LogicalRow[] {
  const { body, header, rowKeyIndex } = layout;
  const out: LogicalRow[] = [];

  for (let i = 0; i < body.length; i++) {
    const cells = body[i];
    if (cells.every((cell) => RULE_CELL.test(cell))) continue;

    const next = i + 1 < body.length ? body[i + 1] : undefined;
    let row: LogicalRow;
    if (cells.length > header.length) {
      if (!next) {
        throw new DecodeError(`row "${cells.join(" | ")}" wraps but has no continuation`, raw);
      }
      row = mergeWrapped(cells, next, layout, raw);
      i++;
    } else if (isSplitRow(cells, next, layout, opts)) {
      row = toRow([...cells, ...next], rowKeyIndex);
      i++;
    } else {
      // не шире заголовка — полная строка, недостающих колонок просто нет
      row = toRow(cells, rowKeyIndex);
    }

    // повтор заголовка или подзаголовок ("|  | MG EG | MG EG |")
    if (row.key === "" || row.key === opts.rowKeyColumn) continue;
    out.push(row);
  }

  return out;
}

/** Ключ колонки по позиции; сверх заголовка ключи повторяются с номером: "MG EG #2" */
function columnKey(valueKeys: string[], position: number): string {
  const n = valueKeys.length;
  if (position < n) return valueKeys[position];
  return `${valueKeys[position % n]} #${Math.floor(position / n) + 1}`;
}

function decodeCell(cell: string, opts: Required<DecoderOptions>, raw: string): ScorePair {
  try {
    return parseScore(cell, opts);
  } catch (err) {
    if (!(err instanceof CellParseError)) throw err;
    if (opts.strictNumeric) throw new DecodeError(err.message, raw, { cause: err });
    return { mg: undefined, eg: undefined };
  }
}

/**
 * Главная функция: сырой текст отчёта -> EvaluationTable.
 * Либо вся таблица, либо DecodeError — частичных результатов нет.
 */
export function decodeTable(raw: string, options: DecoderOptions = {}): EvaluationTable {
  const opts = resolveDecoderOptions(options);

  const rows = raw
    .split(/\r?\n/)
    .filter((line) => line.trimStart().startsWith(TABLE_DELIMITER))
    .map(splitCells);

  const layout = locateHeader(rows, opts, raw);
  const table = new Map<string, Map<string, ScorePair>>();

  for (const row of collectRows(layout, opts, raw)) {
    if (row.values.some(Boolean) && layout.valueKeys.length === 0) {
      throw new DecodeError("header has no value columns", raw);
    }

    const entry = table.get(row.key) ?? new Map<string, ScorePair>();
    table.set(row.key, entry);

    row.values.forEach((cell, position) => {
      if (!cell) return; // разреженная строка: колонки нет — ключа нет
      const key = columnKey(layout.valueKeys, position);
      if (entry.has(key)) throw new DuplicateRowKeyError(row.key, key, raw);
      entry.set(key, decodeCell(cell, opts, raw));
    });
  }

  return Object.fromEntries(
    Array.from(table, ([key, columns]) => [key, Object.fromEntries(columns)])
  );
}
