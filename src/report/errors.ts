export type ReportErrorCode =
  | "decode_failed"
  | "cell_parse_failed"
  | "duplicate_row_key"
  | "capture_incomplete";

export class ReportError extends Error {
  constructor(readonly code: ReportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Текст отчёта не разобрать в таблицу. Сырой текст прикладывается для диагностики. */
export class DecodeError extends ReportError {
  readonly raw: string;

  constructor(
    message: string,
    raw: string,
    options?: { cause?: unknown; code?: ReportErrorCode }
  ) {
    super(options?.code ?? "decode_failed", message, options);
    this.raw = raw;
  }
}

/** Одна ячейка со счётом не разбирается. */
export class CellParseError extends ReportError {
  constructor(readonly cell: string, reason: string) {
    super("cell_parse_failed", `cannot parse score cell "${cell}": ${reason}`);
  }
}

export class DuplicateRowKeyError extends DecodeError {
  constructor(
    readonly rowKey: string,
    readonly columnKey: string,
    raw: string
  ) {
    super(`duplicate cell for row "${rowKey}", column "${columnKey}"`, raw, {
      code: "duplicate_row_key",
    });
  }
}

/** Поток закрылся или команду отменили до конца отчёта. */
export class CapturedIncompleteError extends ReportError {
  constructor(message: string, readonly lines: readonly string[]) {
    super("capture_incomplete", message);
  }
}
