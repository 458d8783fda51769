// src/harness/discover.ts
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

export type DiscoveredEngine = {
  /** Имя для отчётов: "stockfish" -> "Stockfish" */
  name: string;
  path: string;
};

const EXECUTE_BITS = 0o111;

export function displayName(fileName: string): string {
  const base = path.basename(fileName);
  return base.charAt(0).toUpperCase() + base.slice(1).toLowerCase();
}

/**
 * Все исполняемые файлы каталога (без рекурсии), по имени.
 */
export async function discoverEngines(dir: string): Promise<DiscoveredEngine[]> {
  const names = (await readdir(dir)).sort();
  const found: DiscoveredEngine[] = [];

  for (const name of names) {
    const full = path.join(dir, name);
    const st = await stat(full);
    if (!st.isFile() || (st.mode & EXECUTE_BITS) === 0) continue;
    found.push({ name: displayName(name), path: full });
  }

  return found;
}
