import fs from 'node:fs'; import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Writes `obj` as JSON next to `file` under a unique temporary name, then
 * renames it into place, so readers see either the old or the new content.
 */
export function writeJSONAtomic(file: string, obj: unknown) {
  const dir = path.dirname(file);
  ensureDir(dir);
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`);
  try {
    fs.writeFileSync(tmp, JSON.stringify(obj, null, 2), 'utf-8');
    fs.renameSync(tmp, file);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
}

export function readJSON(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
