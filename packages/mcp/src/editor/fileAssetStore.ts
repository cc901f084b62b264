import {
  BridgeError,
  MaterialSchema,
  describeError,
  logicalBasename,
  stripExtension,
  toLogicalPath,
  type AssetRoots,
  type Material,
  type NormalizedAssetPath,
} from "@editor-bridge/core";
import type { AssetFileSystem, AssetStore, TextureAsset } from "./types.js";

export const MATERIAL_EXTENSION = ".mat";

export const TEXTURE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".tga", ".psd", ".exr", ".tif", ".tiff", ".bmp"] as const;

export interface FileAssetStoreOptions {
  fs: AssetFileSystem;
  roots: AssetRoots;
  textExtension: string;
}

function hasExtension(path: string, extensions: readonly string[]): boolean {
  const lower = path.toLowerCase();
  return extensions.some((extension) => lower.endsWith(extension));
}

function parseMaterialFile(text: string, logicalPath: string): Material {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new BridgeError("Unknown", `Material file '${logicalPath}' is not valid JSON.`, describeError(error));
  }
  const parsed = MaterialSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BridgeError(
      "Unknown",
      `Material file '${logicalPath}' is malformed.`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
  }
  return parsed.data;
}

/**
 * Asset store over plain files: materials are JSON documents with a `.mat`
 * extension, textures are image files addressed by path.
 */
export function createFileAssetStore(options: FileAssetStoreOptions): AssetStore {
  const { fs, roots, textExtension } = options;

  return {
    async loadMaterial(path) {
      if (!hasExtension(path.logicalPath, [MATERIAL_EXTENSION]) || !(await fs.isFile(path.physicalPath))) {
        return null;
      }
      return parseMaterialFile(await fs.readText(path.physicalPath), path.logicalPath);
    },

    async saveMaterial(path, material) {
      try {
        await fs.writeText(path.physicalPath, `${JSON.stringify(material, null, 2)}\n`);
      } catch (error) {
        throw new BridgeError(
          "WriteFailed",
          `Failed to write material '${path.logicalPath}': ${describeError(error)}`,
          path.physicalPath,
        );
      }
    },

    async loadTexture(path: NormalizedAssetPath): Promise<TextureAsset | null> {
      if (!hasExtension(path.logicalPath, TEXTURE_EXTENSIONS) || !(await fs.isFile(path.physicalPath))) {
        return null;
      }
      return {
        name: stripExtension(logicalBasename(path.logicalPath)),
        path: path.logicalPath,
      };
    },

    async findScripts(fileName) {
      if (!(await fs.isDirectory(roots.rootDir))) {
        return [];
      }
      const wanted = fileName.toLowerCase();
      const files = await fs.listFiles(roots.rootDir, textExtension);
      return files
        .map((file) => toLogicalPath(file, roots))
        .filter((logicalPath) => logicalBasename(logicalPath).toLowerCase() === wanted);
    },
  };
}
