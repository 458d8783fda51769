import type { Logger } from "pino";

/** Пара значений миттельшпиль/эндшпиль. Отсутствие значения !== 0. */
export type ScorePair = {
  mg?: number;
  eg?: number;
};

/** rowKey -> columnKey -> ScorePair, порядок строк — порядок появления. */
export type EvaluationTable = Record<string, Record<string, ScorePair>>;

export type RawReport = {
  raw: string;                 // текст как его напечатал движок
  table: EvaluationTable;
};

export type HeaderSkip = 0 | 2;
export type SentinelPosition = "leading" | "trailing";

export type DecoderOptions = {
  /** Сколько строк с `|` выбросить перед заголовком (0 — искать заголовок) */
  headerSkip?: HeaderSkip;
  sentinelPosition?: SentinelPosition;
  /** true — битая ячейка валит весь отчёт; false — ячейка становится пустой парой */
  strictNumeric?: boolean;
  /** Имя колонки с ключом строки */
  rowKeyColumn?: string;
  /** Символ «нет значения» */
  sentinel?: string;
};

export type CapturePhase = "not-started" | "capturing" | "finished";

export type CaptureState = {
  phase: CapturePhase;
  /** Терминатор уже пришёл, финализируем на следующей строке */
  closing: boolean;
  buffer: readonly string[];
};

export type CaptureOptions = {
  startMarkers?: readonly string[];
  terminatorPrefix?: string;
  decoder?: DecoderOptions;
  logger?: Logger;
  signal?: AbortSignal;
};
