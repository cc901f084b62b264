import {
  RENDER_MODES,
  listScalarSlots,
  listTemplates,
  listTextureSlots,
  param,
} from "@editor-bridge/core";
import { defineCommand, type RegisteredCommand } from "../router.js";
import { listScaffoldKinds } from "./scaffolds.js";

export interface SystemCommandOptions {
  version: string;
  listCommands: () => readonly RegisteredCommand[];
}

const pingParams = {
  nonce: param.optional("nonce", "string", "Echoed back unchanged."),
};

export function createSystemCommands(options: SystemCommandOptions): RegisteredCommand[] {
  const ping = defineCommand({
    name: "ping",
    description: "Liveness check.",
    params: Object.values(pingParams),
    decode: (params) => ({ nonce: pingParams.nonce.read(params) }),
    async run(input) {
      return {
        ok: true,
        version: options.version,
        nonce: input.nonce ?? null,
      };
    },
  });

  const capabilities = defineCommand({
    name: "capabilities",
    description: "List commands, material templates, render modes and property slots.",
    params: [],
    decode: () => ({}),
    async run(_input, context) {
      return {
        commands: options.listCommands().map((command) => ({
          name: command.name,
          description: command.description,
          params: command.params.map((spec) => ({
            key: spec.key,
            kind: spec.kind,
            required: spec.required,
            ...(spec.fallback === undefined ? {} : { default: spec.fallback }),
          })),
        })),
        pipeline: context.pipeline,
        shaders: context.shaders.names(),
        templates: listTemplates(),
        renderModes: [...RENDER_MODES],
        scaffoldKinds: listScaffoldKinds(),
        slots: {
          texture: listTextureSlots(),
          scalar: listScalarSlots(),
        },
      };
    },
  });

  return [ping, capabilities];
}
