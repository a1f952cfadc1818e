import { promises as fs } from 'node:fs';
import path from 'node:path';

let tmpCounter = 0;

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function readText(p: string): Promise<string> {
  return await fs.readFile(p, 'utf8');
}

/**
 * Writes beside the destination, fsyncs, then renames over it.
 * The temp file is removed when any step fails.
 * Callers serialize writes to the same path.
 */
export async function writeTextAtomic(p: string, content: string): Promise<void> {
  const dir = path.dirname(p);
  await fs.mkdir(dir, { recursive: true });

  tmpCounter += 1;
  const tmp = path.join(dir, `.${path.basename(p)}.${process.pid}.${tmpCounter}.tmp`);

  try {
    const fh = await fs.open(tmp, 'w');
    try {
      await fh.writeFile(content, 'utf8');
      await fh.sync();
    } finally {
      await fh.close();
    }
    await fs.rename(tmp, p);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function writeJson(p: string, value: unknown): Promise<void> {
  await writeTextAtomic(p, `${JSON.stringify(value, null, 2)}\n`);
}
