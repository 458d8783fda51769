// src/engine/variants.ts
// Файл описаний вариантов для VariantPath:
//   [human:chess]
//   pieceValueMg = p:0 n:0 b:0 r:9000 q:0
import { writeFile } from "node:fs/promises";

export type VariantValue = string | number | boolean | Record<string, number | string>;

export type VariantDefinition = {
  name: string;
  /** Вариант-родитель, от которого наследуются правила */
  base?: string;
  settings: Record<string, VariantValue>;
};

function formatValue(value: VariantValue): string {
  if (typeof value === "object") {
    return Object.entries(value)
      .map(([k, v]) => `${k}:${v}`)
      .join(" ");
  }
  return String(value);
}

export function renderVariantsIni(variants: VariantDefinition[]): string {
  return variants
    .map((v) => {
      if (!/^[\w-]+$/.test(v.name)) {
        throw new Error(`invalid variant name "${v.name}"`);
      }
      const title = v.base ? `[${v.name}:${v.base}]` : `[${v.name}]`;
      const lines = Object.entries(v.settings).map(([k, value]) => `${k} = ${formatValue(value)}`);
      return [title, ...lines].join("\n") + "\n";
    })
    .join("\n");
}

export async function writeVariantsIni(path: string, variants: VariantDefinition[]): Promise<string> {
  await writeFile(path, renderVariantsIni(variants), "utf8");
  return path;
}
