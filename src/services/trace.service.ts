// src/services/trace.service.ts
import type { EnginePool } from "../engine/pool";
import type { TraceParams, UciEngine } from "../engine/uci";
import type { RawReport } from "../types/report";

/** Часть UciEngine, нужная сервису */
export type TraceEngine = Pick<UciEngine, "setOption" | "position" | "trace" | "quit">;

export type TraceInput = {
  fen: string;
  moves?: string[];
  /** Значение UCI_Variant; без него — обычные шахматы */
  variant?: string;
};

/** Вариант, в котором движок стартует */
export const DEFAULT_VARIANT = "chess";

export class TraceService {
  // текущий UCI_Variant каждого движка пула
  private readonly variants = new WeakMap<TraceEngine, string>();

  constructor(
    private readonly pool: EnginePool<TraceEngine>,
    private readonly params: TraceParams = {}
  ) {}

  /**
   * Трассировка оценки одной позиции на свободном движке пула.
   */
  async trace(input: TraceInput): Promise<RawReport> {
    return this.pool.use(async (engine) => {
      const wanted = input.variant ?? DEFAULT_VARIANT;
      if (wanted !== (this.variants.get(engine) ?? DEFAULT_VARIANT)) {
        await engine.setOption("UCI_Variant", wanted);
        this.variants.set(engine, wanted);
      }
      engine.position(input.fen, input.moves);
      return engine.trace(this.params);
    });
  }
}
