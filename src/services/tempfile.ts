// src/services/tempfile.ts
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

/**
 * Writes `bytes` into a fresh temp directory, runs `fn` with the file path and removes
 * the directory afterwards, whether `fn` resolved or threw.
 */
export async function withTempFile<T>(
  bytes: Uint8Array,
  fn: (filePath: string) => Promise<T>,
  filename = "upload.pdf"
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "paper-breakdown-"));
  try {
    const filePath = path.join(dir, filename);
    await fs.writeFile(filePath, bytes);
    return await fn(filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
