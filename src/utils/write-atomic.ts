import { mkdir, open, rename, rm } from "fs/promises";
import { dirname } from "node:path";

let sequence = 0;

/**
 * Write a file so that readers only ever see the previous or the new content
 * Data goes to a synced sibling temp file which is then renamed over the target
 */
export async function writeAtomic(filepath: string, content: string): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });

  sequence += 1;
  const tempPath = `${filepath}.${process.pid}.${sequence}.tmp`;

  try {
    const handle = await open(tempPath, "w");
    try {
      await handle.writeFile(content, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filepath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
