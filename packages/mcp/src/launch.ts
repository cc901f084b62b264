import { describeError } from "@editor-bridge/core";
import { parseCliConfig, renderHelpText, type EditorBridgeConfig } from "./config.js";
import { createNodeFileSystem } from "./editor/nodeFileSystem.js";
import type { AssetFileSystem } from "./editor/types.js";
import { startEditorBridgeServer } from "./index.js";

const PROGRAM = "editor-bridge-mcp";

export interface LaunchIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface LaunchOptions {
  env?: NodeJS.ProcessEnv;
  fs?: Pick<AssetFileSystem, "isDirectory" | "isFile">;
  start?: (config: EditorBridgeConfig) => Promise<void>;
}

/** Runs the CLI and resolves with the process exit code. */
export async function launchEditorBridge(argv: string[], io: LaunchIo, options: LaunchOptions = {}): Promise<number> {
  const parsed = parseCliConfig(argv, options.env ?? process.env);
  if (parsed.error === "help") {
    io.stdout(`${renderHelpText()}\n`);
    return 0;
  }
  if (parsed.error) {
    io.stderr(`${PROGRAM}: ${parsed.error}\n`);
    io.stderr(`${renderHelpText()}\n`);
    return 1;
  }

  const { config } = parsed;
  const fs = options.fs ?? createNodeFileSystem();
  if (!(await fs.isDirectory(config.assetRoot))) {
    io.stderr(
      `${PROGRAM}: asset root '${config.assetRoot}' is not a directory. Pass --asset-root or set EB_ASSET_ROOT.\n`,
    );
    return 1;
  }
  if (config.sceneFile && !(await fs.isFile(config.sceneFile))) {
    io.stderr(`${PROGRAM}: scene file '${config.sceneFile}' does not exist.\n`);
    return 1;
  }

  try {
    await (options.start ?? startEditorBridgeServer)(config);
    return 0;
  } catch (error) {
    io.stderr(`${PROGRAM}: could not start the bridge for '${config.assetRoot}': ${describeError(error)}\n`);
    return 1;
  }
}
