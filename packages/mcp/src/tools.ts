import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z, type ZodTypeAny } from "zod";
import type { AnyParamSpec, ParamKind } from "@editor-bridge/core";
import type { CommandRouter, ResultEnvelope } from "./router.js";

// Shapes only describe the parameters to the client. Every field stays optional
// and arrays stay unsized so presence and arity are reported by the command.
const KIND_SCHEMAS: Record<ParamKind, () => ZodTypeAny> = {
  string: () => z.string(),
  number: () => z.number(),
  boolean: () => z.boolean(),
  color: () => z.array(z.number()),
  vector2: () => z.array(z.number()),
  mapping: () => z.record(z.unknown()),
};

function describeSpec(spec: AnyParamSpec): string {
  if (spec.required) {
    return `${spec.description} Required.`;
  }
  if (spec.fallback !== undefined) {
    return `${spec.description} Default: ${JSON.stringify(spec.fallback)}.`;
  }
  return spec.description;
}

export function toInputShape(specs: readonly AnyParamSpec[]): Record<string, ZodTypeAny> {
  const shape: Record<string, ZodTypeAny> = {};
  for (const spec of specs) {
    shape[spec.key] = KIND_SCHEMAS[spec.kind]().optional().describe(describeSpec(spec));
  }
  return shape;
}

export function toToolResult(envelope: ResultEnvelope) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
    structuredContent: envelope,
    isError: !envelope.ok,
  };
}

export function registerEditorBridgeTools(server: McpServer, router: CommandRouter) {
  for (const command of router.list()) {
    server.tool(command.name, command.description, toInputShape(command.params), async (input) => {
      const envelope = await router.dispatch(command.name, input);
      return toToolResult(envelope);
    });
  }
}
