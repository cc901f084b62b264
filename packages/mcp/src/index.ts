import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getShaderCatalog } from "@editor-bridge/core";
import { createEditorCommands } from "./commands/index.js";
import type { EditorBridgeConfig } from "./config.js";
import { createBehaviorRegistry } from "./editor/behaviors.js";
import { createFileAssetStore } from "./editor/fileAssetStore.js";
import { createNodeFileSystem } from "./editor/nodeFileSystem.js";
import { SceneSeedSchema, createMemoryScene, loadSceneSeed } from "./editor/scene.js";
import type { AssetFileSystem, AssetStore, BehaviorRegistry, SceneGraph } from "./editor/types.js";
import { createLogger, type Logger } from "./logger.js";
import { createCommandRouter, type CommandContext, type CommandRouter } from "./router.js";
import { registerEditorBridgeTools } from "./tools.js";

export const MCP_SERVER_NAME = "editor-bridge";
export const MCP_SERVER_VERSION = "0.1.0";

export type EditorBridgeCollaborators = Partial<{
  fs: AssetFileSystem;
  assets: AssetStore;
  scene: SceneGraph;
  behaviors: BehaviorRegistry;
}>;

export interface EditorBridgeServerContext {
  server: McpServer;
  router: CommandRouter;
}

/** Wires the headless editor for a config; any collaborator can be replaced. */
export async function createEditorContext(
  config: EditorBridgeConfig,
  logger: Logger,
  collaborators: EditorBridgeCollaborators = {},
): Promise<CommandContext> {
  const fs = collaborators.fs ?? createNodeFileSystem();
  const roots = { rootName: config.rootName, rootDir: config.assetRoot };
  const seed = config.sceneFile ? await loadSceneSeed(fs, config.sceneFile) : SceneSeedSchema.parse({});
  return {
    roots,
    fs,
    assets: collaborators.assets ?? createFileAssetStore({ fs, roots, textExtension: config.textExtension }),
    scene: collaborators.scene ?? createMemoryScene(seed),
    behaviors: collaborators.behaviors ?? createBehaviorRegistry(seed.behaviors),
    shaders: getShaderCatalog(),
    pipeline: config.pipeline,
    textExtension: config.textExtension,
    logger,
  };
}

export function createEditorBridgeServer(context: CommandContext): EditorBridgeServerContext {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });
  const router: CommandRouter = createCommandRouter(
    createEditorCommands({
      version: MCP_SERVER_VERSION,
      listCommands: () => router.list(),
    }),
    context,
  );
  registerEditorBridgeTools(server, router);
  return {
    server,
    router,
  };
}

export async function startEditorBridgeServer(config: EditorBridgeConfig): Promise<void> {
  const logger = createLogger(config.logLevel);
  const context = await createEditorContext(config, logger);
  const { server, router } = createEditorBridgeServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    { assetRoot: config.assetRoot, pipeline: config.pipeline, commands: router.list().length },
    "editor bridge listening on stdio",
  );
}

export { parseCliConfig, renderHelpText, DEFAULT_CONFIG } from "./config.js";
export type { EditorBridgeConfig } from "./config.js";
export { createCommandRouter, defineCommand } from "./router.js";
export type { CommandContext, CommandRouter, RegisteredCommand, ResultEnvelope } from "./router.js";
