import { randomUUID } from "crypto";
import { mkdir, open, readdir, readFile, rename, rm, rmdir } from "fs/promises";
import path from "path";
import { assertValidKey, type DurableStorage } from "./storage";

function hasCode(error: unknown, ...codes: string[]): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}

/**
 * DurableStorage on the local file system. Each key is a file under `rootDir`.
 * Writes go to a temp file in the same directory and are renamed into place,
 * so a reader (or a restarted process) sees the whole object or nothing.
 */
export class FileSystemStorage implements DurableStorage {
  constructor(private readonly rootDir: string) {}

  private pathFor(key: string): string {
    assertValidKey(key);
    return path.join(this.rootDir, ...key.split("/"));
  }

  async put(key: string, bytes: Uint8Array): Promise<void> {
    const target = this.pathFor(key);
    await mkdir(path.dirname(target), { recursive: true });

    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      const handle = await open(temp, "w");
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      const buffer = await readFile(this.pathFor(key));
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error) {
      if (hasCode(error, "ENOENT")) return null;
      throw error;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    await this.walk(this.rootDir, "", keys);
    return keys.filter((key) => key.startsWith(prefix));
  }

  async delete(key: string): Promise<void> {
    const target = this.pathFor(key);
    await rm(target, { force: true });
    await this.pruneEmptyDirs(path.dirname(target));
  }

  private async walk(dir: string, relative: string, out: string[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      if (hasCode(error, "ENOENT")) return null;
      throw error;
    });
    if (!entries) return;

    for (const entry of entries) {
      const key = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await this.walk(path.join(dir, entry.name), key, out);
      } else if (entry.isFile() && !entry.name.endsWith(".tmp")) {
        out.push(key);
      }
    }
  }

  /**
   * Remove directories left empty by a delete, stopping at the root or at the
   * first directory that still has entries.
   */
  private async pruneEmptyDirs(dir: string): Promise<void> {
    const root = path.resolve(this.rootDir);
    let current = path.resolve(dir);
    while (current.startsWith(root + path.sep)) {
      try {
        await rmdir(current);
      } catch (error) {
        if (hasCode(error, "ENOTEMPTY", "EEXIST", "ENOENT")) return;
        throw error;
      }
      current = path.dirname(current);
    }
  }
}
