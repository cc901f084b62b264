import { resolve } from "node:path";
import { SHADING_BACKENDS, type ShadingBackend } from "@editor-bridge/core";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "./logger.js";

export interface EditorBridgeConfig {
  transport: "stdio";
  /** Directory the logical root segment maps to. */
  assetRoot: string;
  rootName: string;
  pipeline: ShadingBackend;
  sceneFile?: string;
  /** Extension of behavior source files, including the dot. */
  textExtension: string;
  logLevel: LogLevel;
}

export interface ParsedCliConfig {
  config: EditorBridgeConfig;
  error?: string;
}

export const DEFAULT_CONFIG: EditorBridgeConfig = {
  transport: "stdio",
  assetRoot: resolve(process.cwd(), "Assets"),
  rootName: "Assets",
  pipeline: "legacy",
  textExtension: ".cs",
  logLevel: "info",
};

function isPipeline(value: string): value is ShadingBackend {
  return SHADING_BACKENDS.some((backend) => backend === value);
}

function normalizeExtension(value: string): string {
  return value.startsWith(".") ? value : `.${value}`;
}

const VALUE_FLAGS = new Set([
  "--asset-root",
  "--root-name",
  "--pipeline",
  "--scene",
  "--text-extension",
  "--log-level",
]);

function applySetting(config: EditorBridgeConfig, flag: string, value: string): string | undefined {
  switch (flag) {
    case "--asset-root":
      config.assetRoot = resolve(value);
      return undefined;
    case "--root-name":
      if (/[\\/]/.test(value)) {
        return `Invalid --root-name value "${value}".`;
      }
      config.rootName = value;
      return undefined;
    case "--pipeline":
      if (!isPipeline(value)) {
        return `Invalid --pipeline value "${value}". Expected one of: ${SHADING_BACKENDS.join(", ")}.`;
      }
      config.pipeline = value;
      return undefined;
    case "--scene":
      config.sceneFile = resolve(value);
      return undefined;
    case "--text-extension":
      if (value === "." || value === "") {
        return `Invalid --text-extension value "${value}".`;
      }
      config.textExtension = normalizeExtension(value);
      return undefined;
    case "--log-level":
      if (!isLogLevel(value)) {
        return `Invalid --log-level value "${value}". Expected one of: ${LOG_LEVELS.join(", ")}.`;
      }
      config.logLevel = value;
      return undefined;
    default:
      return `Unknown flag "${flag}".`;
  }
}

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config: EditorBridgeConfig = {
    ...DEFAULT_CONFIG,
  };

  const fromEnv: Array<[name: string, flag: string]> = [
    ["EB_ASSET_ROOT", "--asset-root"],
    ["EB_PIPELINE", "--pipeline"],
    ["EB_SCENE_FILE", "--scene"],
    ["EB_LOG_LEVEL", "--log-level"],
  ];
  for (const [name, flag] of fromEnv) {
    const value = env[name];
    if (!value) continue;
    const error = applySetting(config, flag, value);
    if (error) {
      return { config, error: `${name}: ${error}` };
    }
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      continue;
    }
    if (arg === "--stdio") {
      config.transport = "stdio";
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return {
        config,
        error: "help",
      };
    }
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[index + 1];
      if (!value) {
        return {
          config,
          error: `${arg} requires a value.`,
        };
      }
      const error = applySetting(config, arg, value);
      if (error) {
        return { config, error };
      }
      index += 1;
      continue;
    }
    return {
      config,
      error: `Unknown flag "${arg}".`,
    };
  }

  return { config };
}

export function renderHelpText() {
  return [
    "editor-bridge-mcp",
    "",
    "Usage:",
    "  editor-bridge-mcp --stdio --asset-root ./Assets",
    "",
    "Flags:",
    "  --stdio                  Run MCP over stdio (default).",
    "  --asset-root <dir>       Directory behind the root segment (default: ./Assets, env EB_ASSET_ROOT).",
    "  --root-name <name>       Logical root segment of asset paths (default: Assets).",
    `  --pipeline <name>        Render pipeline for new materials: ${SHADING_BACKENDS.join(" | ")} (default: legacy, env EB_PIPELINE).`,
    "  --scene <file>           Scene seed JSON with objects and behavior types (env EB_SCENE_FILE).",
    "  --text-extension <ext>   Extension of behavior source files (default: .cs).",
    "  --log-level <level>      pino level written to stderr (default: info, env EB_LOG_LEVEL).",
    "  -h, --help               Show help.",
  ].join("\n");
}
