// src/report/encode.ts
// Обратное преобразование: EvaluationTable -> текст в формате трассировки.
// Нужен для проверки декодера и для печати таблиц в харнессе.

import type { DecoderOptions, EvaluationTable, ScorePair } from "../types/report";
import { TABLE_DELIMITER, resolveDecoderOptions } from "./decode";

const TITLE_ROWS = ["Evaluation trace", "mg eg"];

function formatScore(score: ScorePair, sentinel: string): string {
  const fmt = (v: number | undefined) => (v === undefined ? sentinel : String(v));
  return `${fmt(score.mg)} ${fmt(score.eg)}`;
}

function formatRow(cells: string[], widths: number[]): string {
  const padded = cells.map((cell, i) => cell.padStart(widths[i] ?? cell.length));
  return `${TABLE_DELIMITER} ${padded.join(` ${TABLE_DELIMITER} `)} ${TABLE_DELIMITER}`;
}

/** Колонки в порядке первого появления по всем строкам */
function columnsOf(table: EvaluationTable): string[] {
  const seen = new Set<string>();
  for (const columns of Object.values(table)) {
    for (const key of Object.keys(columns)) seen.add(key);
  }
  return [...seen];
}

/**
 * Отрисовать таблицу так, чтобы decodeTable с теми же опциями вернул те же значения.
 * Отсутствующая колонка — пустая ячейка, пустое значение — символ-заглушка.
 */
export function renderTable(table: EvaluationTable, options: DecoderOptions = {}): string {
  const opts = resolveDecoderOptions(options);
  const columns = columnsOf(table);

  const header = [opts.rowKeyColumn, ...columns];
  const rows = Object.entries(table).map(([key, values]) => [
    key,
    ...columns.map((column) => {
      const score = values[column];
      return score ? formatScore(score, opts.sentinel) : "";
    }),
  ]);

  const widths = header.map((_, i) =>
    Math.max(...[header, ...rows].map((cells) => cells[i].length))
  );

  const lines: string[] = [];
  if (opts.headerSkip === 2) {
    for (const title of TITLE_ROWS) lines.push(`${TABLE_DELIMITER} ${title} ${TABLE_DELIMITER}`);
  }
  lines.push(formatRow(header, widths));
  for (const cells of rows) lines.push(formatRow(cells, widths));

  return lines.join("\n") + "\n";
}
