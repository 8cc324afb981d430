import { mkdir, open, rename, rm, type FileHandle } from "fs/promises";
import { dirname } from "path";
import { randomUUID } from "crypto";

export interface AtomicWriteOptions {
  /** File mode for the written file, owner-only by default */
  mode?: number;
}

/**
 * Write to a temp sibling, fsync, then rename over the target.
 * The temp file is removed on any failure and the error is rethrown.
 * Missing parent directories are created owner-only.
 */
export async function writeFileAtomically(
  targetPath: string,
  data: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const dirPath = dirname(targetPath);
  const tempPath = `${targetPath}.tmp-${process.pid}-${randomUUID()}`;

  await mkdir(dirPath, { recursive: true, mode: 0o700 });

  let handle: FileHandle | undefined;
  try {
    handle = await open(tempPath, "wx", options.mode ?? 0o600);
    await handle.writeFile(data, "utf8");
    await handle.sync();
  } catch (err) {
    await handle?.close();
    handle = undefined;
    await rm(tempPath, { force: true });
    throw err;
  } finally {
    await handle?.close();
  }

  try {
    await rename(tempPath, targetPath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
