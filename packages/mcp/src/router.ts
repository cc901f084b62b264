import { performance } from "node:perf_hooks";
import {
  asBridgeError,
  type AnyParamSpec,
  type AssetRoots,
  type BridgeErrorCode,
  type ParamBag,
  type ShaderCatalog,
  type ShadingBackend,
} from "@editor-bridge/core";
import type { AssetFileSystem, AssetStore, BehaviorRegistry, SceneGraph } from "./editor/types.js";
import type { Logger } from "./logger.js";

export type CommandData = Record<string, unknown>;

export type CommandSuccess = {
  ok: true;
  data: CommandData;
};

export type CommandFailure = {
  ok: false;
  error: {
    code: BridgeErrorCode;
    message: string;
    detail?: string;
  };
};

export type ResultEnvelope = CommandSuccess | CommandFailure;

export interface CommandContext {
  roots: AssetRoots;
  fs: AssetFileSystem;
  assets: AssetStore;
  scene: SceneGraph;
  behaviors: BehaviorRegistry;
  shaders: ShaderCatalog;
  /** Pipeline used for materials the bridge creates. */
  pipeline: ShadingBackend;
  textExtension: string;
  logger: Logger;
}

export interface CommandDefinition<TInput> {
  name: string;
  description: string;
  params: readonly AnyParamSpec[];
  /** Builds the typed input; runs before any side effect. */
  decode(params: ParamBag): TInput;
  run(input: TInput, context: CommandContext): Promise<CommandData>;
}

export interface RegisteredCommand {
  name: string;
  description: string;
  params: readonly AnyParamSpec[];
  execute(params: ParamBag, context: CommandContext): Promise<CommandData>;
}

export function defineCommand<TInput>(definition: CommandDefinition<TInput>): RegisteredCommand {
  return {
    name: definition.name,
    description: definition.description,
    params: definition.params,
    execute: (params, context) => {
      const input = definition.decode(params);
      return definition.run(input, context);
    },
  };
}

export interface CommandRouter {
  /** Resolves with exactly one envelope; never rejects. */
  dispatch(name: string, params?: ParamBag): Promise<ResultEnvelope>;
  list(): RegisteredCommand[];
}

export function toFailure(error: unknown): CommandFailure {
  const resolved = asBridgeError(error, "Unknown", "Command failed.");
  return {
    ok: false,
    error: {
      code: resolved.code,
      message: resolved.message,
      ...(resolved.detail === undefined ? {} : { detail: resolved.detail }),
    },
  };
}

/**
 * Commands run strictly one at a time in arrival order, matching the single
 * editor thread they would otherwise execute on.
 */
export function createCommandRouter(commands: readonly RegisteredCommand[], context: CommandContext): CommandRouter {
  const registry = new Map<string, RegisteredCommand>();
  for (const command of commands) {
    if (registry.has(command.name)) {
      throw new Error(`Command "${command.name}" is registered twice.`);
    }
    registry.set(command.name, command);
  }

  let tail: Promise<unknown> = Promise.resolve();
  let sequence = 0;

  async function execute(name: string, params: ParamBag, seq: number): Promise<ResultEnvelope> {
    const log = context.logger.child({ command: name, seq });
    const command = registry.get(name);
    if (!command) {
      log.warn({ code: "UnknownCommand" }, "unknown command");
      return {
        ok: false,
        error: { code: "UnknownCommand", message: `Unknown command: ${name}` },
      };
    }

    const startedAt = performance.now();
    try {
      const data = await command.execute(params, { ...context, logger: log });
      log.info({ code: "ok", durationMs: Math.round(performance.now() - startedAt) }, "command completed");
      return { ok: true, data };
    } catch (error) {
      const failure = toFailure(error);
      const durationMs = Math.round(performance.now() - startedAt);
      if (failure.error.code === "Unknown") {
        log.error({ code: failure.error.code, durationMs, err: error }, "command faulted");
      } else {
        log.info({ code: failure.error.code, durationMs }, "command failed");
      }
      return failure;
    }
  }

  return {
    dispatch(name, params = {}) {
      sequence += 1;
      const seq = sequence;
      const result = tail.then(() => execute(name, params, seq));
      tail = result;
      return result;
    },
    list: () => Array.from(registry.values()).sort((a, b) => a.name.localeCompare(b.name)),
  };
}
