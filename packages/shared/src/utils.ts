import * as fs from 'node:fs';

/** Create a directory tree if missing. Returns true when it was created. */
export function mkdirSafe(dir: string): boolean {
  if (fs.existsSync(dir)) return false;
  fs.mkdirSync(dir, { recursive: true });
  return true;
}
