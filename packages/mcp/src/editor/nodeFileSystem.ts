import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AssetFileSystem } from "./types.js";

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function walk(directory: string, extension: string, out: string[]): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      await walk(path, extension, out);
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(extension)) {
      out.push(path);
    }
  }
}

export function createNodeFileSystem(): AssetFileSystem {
  return {
    async isFile(path) {
      return (await statOrNull(path))?.isFile() ?? false;
    },
    async isDirectory(path) {
      return (await statOrNull(path))?.isDirectory() ?? false;
    },
    readText: (path) => readFile(path, "utf8"),
    writeText: (path, content) => writeFile(path, content, "utf8"),
    async makeDirectory(path) {
      await mkdir(path, { recursive: true });
    },
    async listFiles(directory, extension) {
      const out: string[] = [];
      await walk(directory, extension.toLowerCase(), out);
      return out.sort();
    },
  };
}
