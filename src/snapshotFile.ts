import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

/** Snapshot bytes, or `undefined` when no snapshot has been written yet. */
export async function loadSnapshot(p: string): Promise<Buffer | undefined> {
  try {
    return await readFile(p);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return undefined;
    throw e;
  }
}

export async function saveSnapshot(outPath: string, bytes: Uint8Array): Promise<void> {
  await mkdir(path.dirname(outPath), { recursive: true });
  const tmp = `${outPath}.tmp`;
  await writeFile(tmp, bytes);
  await rename(tmp, outPath);
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
