import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { TreeSnapshot } from './memory-store';

const TreeSnapshotSchema = z.object({
  version: z.literal(1),
  nodes: z.array(
    z.object({
      id: z.string(),
      parentId: z.string().nullable(),
      title: z.string(),
      content: z.string()
    })
  )
});

const writes = new Map<string, Promise<void>>();
let tmpSeq = 0;

/**
 * Writes through a temporary file and a rename. Saves to the same path run one after
 * another, in call order, each with the snapshot taken at call time.
 */
export function saveSnapshot(filePath: string, snapshot: TreeSnapshot): Promise<void> {
  const key = path.resolve(filePath);
  const body = JSON.stringify(snapshot, null, 2);
  const previous = writes.get(key) ?? Promise.resolve();
  // an earlier failure already rejected its own caller
  const next = previous.catch(() => undefined).then(() => writeAtomically(filePath, body));
  writes.set(key, next);
  return next.finally(() => {
    if (writes.get(key) === next) writes.delete(key);
  });
}

async function writeAtomically(filePath: string, body: string) {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.${++tmpSeq}.tmp`;
  try {
    await writeFile(tmp, body, 'utf8');
    await rename(tmp, filePath);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

/** Undefined when no snapshot has been written yet. */
export async function loadSnapshot(filePath: string): Promise<TreeSnapshot | undefined> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  return TreeSnapshotSchema.parse(JSON.parse(raw));
}
