import fs from "fs/promises";
import os from "os";
import path from "path";

/**
 * Permission bits do not stop root, and Windows ignores most of them.
 */
export const permissionsEnforced = process.platform !== "win32" && process.getuid?.() !== 0;

/**
 * Create a scratch directory and return its canonical path.
 */
export async function makeScratchDir(): Promise<string> {
  const created = await fs.mkdtemp(path.join(os.tmpdir(), "fileguard-test-"));
  return fs.realpath(created);
}

export async function removeScratchDir(dir: string): Promise<void> {
  await restoreWritable(dir);
  await fs.rm(dir, { recursive: true, force: true });
}

// chmod'ed entries would otherwise block the cleanup
async function restoreWritable(dir: string): Promise<void> {
  await fs.chmod(dir, 0o700);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await restoreWritable(entryPath);
    } else if (entry.isFile()) {
      await fs.chmod(entryPath, 0o600);
    }
  }
}
