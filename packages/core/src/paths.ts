import { isAbsolute, join, relative, sep } from "node:path";
import { BridgeError, describeError } from "./errors.js";

export interface AssetRoots {
  /** Logical root segment, e.g. "Assets". */
  rootName: string;
  /** Filesystem directory the root segment maps to. */
  rootDir: string;
}

export interface NormalizedAssetPath {
  logicalPath: string;
  physicalPath: string;
  /** Portion after the root segment, "" for the root itself. */
  relativePath: string;
}

export interface DirectoryMaker {
  makeDirectory(path: string): Promise<void>;
}

export function normalizeAssetPath(userPath: string, roots: AssetRoots): NormalizedAssetPath {
  const segments = userPath
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".");
  if (segments.includes("..")) {
    throw new BridgeError("InvalidPath", `Path '${userPath}' must stay inside the ${roots.rootName} folder.`);
  }

  const rootKey = roots.rootName.toLowerCase();
  let start = 0;
  while (start < segments.length && segments[start].toLowerCase() === rootKey) {
    start += 1;
  }
  const rest = segments.slice(start);

  return {
    logicalPath: [roots.rootName, ...rest].join("/"),
    physicalPath: rest.length > 0 ? join(roots.rootDir, ...rest) : roots.rootDir,
    relativePath: rest.join("/"),
  };
}

export function toLogicalPath(physicalPath: string, roots: AssetRoots): string {
  const rel = relative(roots.rootDir, physicalPath);
  if (rel === "") {
    return roots.rootName;
  }
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new BridgeError("InvalidPath", `Path '${physicalPath}' is outside the ${roots.rootName} folder.`);
  }
  return [roots.rootName, ...rel.split(sep)].join("/");
}

export function logicalDirname(logicalPath: string): string {
  const index = logicalPath.lastIndexOf("/");
  return index < 0 ? logicalPath : logicalPath.slice(0, index);
}

export function logicalBasename(logicalPath: string): string {
  const index = logicalPath.lastIndexOf("/");
  return index < 0 ? logicalPath : logicalPath.slice(index + 1);
}

export function stripExtension(fileName: string): string {
  const index = fileName.lastIndexOf(".");
  return index <= 0 ? fileName : fileName.slice(0, index);
}

export async function ensureDirectory(fs: DirectoryMaker, physicalDir: string, logicalDir: string): Promise<void> {
  try {
    await fs.makeDirectory(physicalDir);
  } catch (error) {
    throw new BridgeError(
      "DirectoryCreateFailed",
      `Failed to create directory '${logicalDir}': ${describeError(error)}`,
      physicalDir,
    );
  }
}
