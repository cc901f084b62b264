import { dirname } from "node:path";
import {
  BridgeError,
  decodePayload,
  describeError,
  ensureDirectory,
  logicalDirname,
  normalizeAssetPath,
  param,
  toLogicalPath,
  toTransportRecord,
  type NormalizedAssetPath,
} from "@editor-bridge/core";
import type { AssetFileSystem } from "../editor/types.js";
import { defineCommand, type RegisteredCommand } from "../router.js";
import { DEFAULT_SCAFFOLD_KIND, NAMESPACE_PATTERN, renderScaffold } from "./scaffolds.js";

export const TEXT_ASSET_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const DEFAULT_SCRIPT_FOLDER = "Scripts";

async function writeTextAsset(fs: AssetFileSystem, file: NormalizedAssetPath, content: string): Promise<void> {
  try {
    await fs.writeText(file.physicalPath, content);
  } catch (error) {
    throw new BridgeError("WriteFailed", `Failed to write '${file.logicalPath}': ${describeError(error)}`, file.physicalPath);
  }
}

function stripTextExtension(name: string, extension: string): string {
  return name.toLowerCase().endsWith(extension.toLowerCase()) ? name.slice(0, -extension.length) : name;
}

const viewParams = {
  path: param.required("path", "string", "Asset path, with or without the root segment."),
  requireExists: param.withDefault("requireExists", "boolean", true, "Fail with NotFound when the file is missing."),
};

export const viewTextAsset = defineCommand({
  name: "view-text-asset",
  description: "Read a text asset. Bodies over 10000 characters come back base64-encoded in encodedContent.",
  params: Object.values(viewParams),
  decode: (params) => ({
    path: viewParams.path.read(params),
    requireExists: viewParams.requireExists.read(params),
  }),
  async run(input, { fs, roots }) {
    const file = normalizeAssetPath(input.path, roots);
    if (!(await fs.isFile(file.physicalPath))) {
      if (input.requireExists) {
        throw new BridgeError("NotFound", `File not found: ${file.logicalPath}`);
      }
      return { exists: false, path: file.logicalPath };
    }
    const text = await fs.readText(file.physicalPath);
    return {
      exists: true,
      path: file.logicalPath,
      ...toTransportRecord(text),
    };
  },
});

const createParams = {
  name: param.required("name", "string", "Type name; letters, digits and underscores, not starting with a digit."),
  kind: param.withDefault("kind", "string", DEFAULT_SCAFFOLD_KIND, "Scaffold kind: behaviour, scriptable, editor, editorWindow or plain."),
  namespace: param.optional("namespace", "string", "Namespace wrapping the generated type."),
  folder: param.withDefault("folder", "string", DEFAULT_SCRIPT_FOLDER, "Folder under the asset root."),
  overwrite: param.withDefault("overwrite", "boolean", false, "Replace an existing file."),
  content: param.optional("content", "string", "Body to write instead of the generated scaffold."),
  contentEncoded: param.withDefault("contentEncoded", "boolean", false, "content is base64 of UTF-8 bytes."),
};

export const createTextAsset = defineCommand({
  name: "create-text-asset",
  description: "Create a behavior source file from a scaffold or from the given content.",
  params: Object.values(createParams),
  decode(params) {
    const content = createParams.content.read(params);
    return {
      name: createParams.name.read(params),
      kind: createParams.kind.read(params),
      namespace: createParams.namespace.read(params),
      folder: createParams.folder.read(params),
      overwrite: createParams.overwrite.read(params),
      content: content === undefined ? undefined : decodePayload(content, createParams.contentEncoded.read(params)),
    };
  },
  async run(input, { fs, roots, textExtension }) {
    const typeName = stripTextExtension(input.name, textExtension);
    if (!TEXT_ASSET_NAME_PATTERN.test(typeName)) {
      throw new BridgeError(
        "InvalidName",
        `Invalid name: '${input.name}'. Use only letters, numbers and underscores, and do not start with a number.`,
      );
    }
    if (input.namespace !== undefined && input.namespace !== "" && !NAMESPACE_PATTERN.test(input.namespace)) {
      throw new BridgeError("InvalidName", `Invalid namespace: '${input.namespace}'.`);
    }

    let folder = normalizeAssetPath(input.folder, roots);
    if (folder.relativePath === "") {
      folder = normalizeAssetPath(DEFAULT_SCRIPT_FOLDER, roots);
    }
    const file = normalizeAssetPath(`${folder.logicalPath}/${typeName}${textExtension}`, roots);

    const existed = await fs.isFile(file.physicalPath);
    if (existed && !input.overwrite) {
      throw new BridgeError("AlreadyExists", `File already exists at '${file.logicalPath}'. Use overwrite=true to replace it.`);
    }

    const content = input.content ? input.content : renderScaffold(typeName, input.kind, input.namespace || undefined);
    await ensureDirectory(fs, folder.physicalPath, folder.logicalPath);
    await writeTextAsset(fs, file, content);
    return { path: file.logicalPath, created: !existed };
  },
});

const updateParams = {
  path: param.required("path", "string", "Asset path of the file to replace."),
  content: param.required("content", "string", "New body; base64 of UTF-8 bytes when contentEncoded is true."),
  createIfMissing: param.withDefault("createIfMissing", "boolean", false, "Create the file when it does not exist."),
  createFolderIfMissing: param.withDefault("createFolderIfMissing", "boolean", false, "Create the parent folder when it does not exist."),
  contentEncoded: param.withDefault("contentEncoded", "boolean", false, "content is base64 of UTF-8 bytes."),
};

export const updateTextAsset = defineCommand({
  name: "update-text-asset",
  description: "Replace the content of a text asset.",
  params: Object.values(updateParams),
  decode: (params) => ({
    path: updateParams.path.read(params),
    content: decodePayload(updateParams.content.read(params), updateParams.contentEncoded.read(params)),
    createIfMissing: updateParams.createIfMissing.read(params),
    createFolderIfMissing: updateParams.createFolderIfMissing.read(params),
  }),
  async run(input, { fs, roots }) {
    const file = normalizeAssetPath(input.path, roots);
    if (file.relativePath === "") {
      throw new BridgeError("InvalidPath", `Path '${input.path}' does not name a file.`);
    }

    const directory = dirname(file.physicalPath);
    const logicalDirectory = logicalDirname(file.logicalPath);
    const directoryExists = await fs.isDirectory(directory);
    if (!directoryExists && !input.createFolderIfMissing) {
      throw new BridgeError("NotFound", `Directory does not exist: ${logicalDirectory}`);
    }

    // A missing directory implies a missing file.
    const existed = directoryExists && (await fs.isFile(file.physicalPath));
    if (!existed && !input.createIfMissing) {
      throw new BridgeError("NotFound", `File not found: ${file.logicalPath}`);
    }

    if (!directoryExists) {
      await ensureDirectory(fs, directory, logicalDirectory);
    }
    await writeTextAsset(fs, file, input.content);
    return { path: file.logicalPath, created: !existed };
  },
});

const listParams = {
  folderPath: param.optional("folderPath", "string", "Folder to search recursively; defaults to the asset root."),
};

export const listTextAssets = defineCommand({
  name: "list-text-assets",
  description: "List behavior source files under a folder, recursively.",
  params: Object.values(listParams),
  decode: (params) => ({
    folderPath: listParams.folderPath.read(params),
  }),
  async run(input, { fs, roots, textExtension }) {
    const folder = normalizeAssetPath(input.folderPath ?? "", roots);
    if (!(await fs.isDirectory(folder.physicalPath))) {
      throw new BridgeError("NotFound", `Folder not found: ${folder.logicalPath}`);
    }
    const files = await fs.listFiles(folder.physicalPath, textExtension);
    return { paths: files.map((file) => toLogicalPath(file, roots)) };
  },
});

export const textAssetCommands: RegisteredCommand[] = [viewTextAsset, createTextAsset, updateTextAsset, listTextAssets];
