import fs from "node:fs";
import path from "node:path";

/**
 * First candidate that exists on disk, resolved against `cwd`.
 * Order matters: MODEL_PATH, then the fallback list.
 */
export function resolveModelPath(candidates: ReadonlyArray<string>, cwd: string = process.cwd()): string | null {
  for (const c of candidates) {
    const abs = path.resolve(cwd, c);
    if (fs.existsSync(abs) && fs.statSync(abs).isFile()) return abs;
  }
  return null;
}
