import { UciEngine, UciOptions } from "./uci";

/** То, что пул умеет останавливать */
export interface PooledEngine {
  quit(): Promise<void>;
}

type PoolCfg<E extends PooledEngine> = {
  size: number;
  create: () => Promise<E>;
};

export class EnginePool<E extends PooledEngine = UciEngine> {
  private engines: E[] = [];
  private all: E[] = [];
  private queue: Array<(e: E) => void> = [];
  private started = false;

  constructor(private readonly cfg: PoolCfg<E>) {}

  async start() {
    if (this.started) return;
    this.started = true;

    for (let i = 0; i < this.cfg.size; i++) {
      const eng = await this.cfg.create();
      this.engines.push(eng);
      this.all.push(eng);
    }
  }

  async stop() {
    await Promise.all(this.all.map((e) => e.quit()));
    this.engines = [];
    this.all = [];
    this.started = false;
  }

  get size() {
    return this.all.length;
  }

  /**
   * Выдаёт движок эксклюзивно, возвращайте через release().
   */
  acquire(): Promise<E> {
    return new Promise((resolve) => {
      const eng = this.engines.pop();
      if (eng) resolve(eng);
      else this.queue.push(resolve);
    });
  }

  release(eng: E) {
    const waiter = this.queue.shift();
    if (waiter) waiter(eng);
    else this.engines.push(eng);
  }

  /** acquire + release вокруг задачи */
  async use<T>(task: (e: E) => Promise<T>): Promise<T> {
    const eng = await this.acquire();
    try {
      return await task(eng);
    } finally {
      this.release(eng);
    }
  }
}

/** Запуск и прогрев одного движка для пула */
export async function createUciEngine(path: string, options: UciOptions = {}): Promise<UciEngine> {
  const eng = new UciEngine(path, options);
  await eng.start();
  await eng.newGame();
  return eng;
}
