/** Исходящая сторона: одна строка протокола за вызов. */
export interface LineTransport {
  send(line: string): void;
}

/**
 * Входящая сторона: транспорт вызывает onLine строго по порядку прихода,
 * close() — когда поток закончился (процесс вышел, stdout закрыт).
 */
export interface LineSink {
  onLine(line: string): void;
  close(): void;
}
