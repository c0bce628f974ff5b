import * as fs from 'fs';
import * as path from 'path';

export type ExistsFn = (candidate: string) => boolean;

const FIRST_SEQUENCE = 1;

/**
 * Picks `<base><suffix>` in `directory`, or `<base>-N<suffix>` for the first
 * N ≥ 1 that is free. The result is a candidate only: nothing is reserved,
 * so callers should create it exclusively.
 */
export function nameFor(
  base: string,
  suffix: string,
  directory: string,
  exists: ExistsFn = fs.existsSync,
): string {
  const first = path.join(directory, `${base}${suffix}`);
  if (!exists(first)) return first;

  for (let n = FIRST_SEQUENCE; ; n += 1) {
    const candidate = path.join(directory, `${base}-${n}${suffix}`);
    if (!exists(candidate)) return candidate;
  }
}

/** Splits `dir/name.ext` into its directory and extension-less base name. */
export function splitInputPath(inputPath: string): { directory: string; base: string } {
  const parsed = path.parse(inputPath);
  return { directory: parsed.dir === '' ? '.' : parsed.dir, base: parsed.name };
}
