import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export async function makeTmpDir(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `logsweep-${label}-`));
}

/** Every file (not directory) under `dir`, relative to it. */
export async function listFilesRecursive(dir: string): Promise<string[]> {
  const out: string[] = [];
  async function walk(d: string) {
    for (const e of await fs.readdir(d, { withFileTypes: true })) {
      const full = path.join(d, e.name);
      if (e.isDirectory()) await walk(full);
      else out.push(path.relative(dir, full));
    }
  }
  await walk(dir);
  return out.sort();
}
