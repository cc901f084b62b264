import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createEditorBridgeServer } from "../index.js";
import { createTestWorkspace, type TestWorkspace } from "./fixtures.js";

function readEnvelope(result: CallToolResult): unknown {
  for (const item of result.content) {
    if (item.type === "text") {
      return JSON.parse(item.text);
    }
  }
  throw new Error("Missing text payload.");
}

describe("mcp contract", () => {
  let workspace: TestWorkspace;
  let client: Client;

  beforeEach(async () => {
    workspace = await createTestWorkspace();
    const { server } = createEditorBridgeServer(workspace.context);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "contract-test", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await workspace.cleanup();
  });

  async function call(name: string, args: Record<string, unknown>) {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  }

  it("lists every editor command as a tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "attach-behavior",
      "capabilities",
      "create-advanced-material",
      "create-material-from-template",
      "create-text-asset",
      "list-text-assets",
      "ping",
      "set-material",
      "set-material-properties",
      "set-material-texture",
      "update-text-asset",
      "view-text-asset",
    ]);
  });

  it("answers ping with the server version and nonce", async () => {
    const result = await call("ping", { nonce: "n1" });
    expect(result.isError).toBe(false);
    expect(readEnvelope(result)).toEqual({ ok: true, data: { ok: true, version: "0.1.0", nonce: "n1" } });
  });

  it("returns failures as error results with the envelope", async () => {
    const result = await call("create-text-asset", {});
    expect(result.isError).toBe(true);
    expect(readEnvelope(result)).toEqual({
      ok: false,
      error: { code: "MissingParameter", message: "Parameter 'name' is required." },
    });
  });

  it("runs commands against the workspace", async () => {
    const created = await call("create-text-asset", { name: "Spinner", content: "// spin\n" });
    expect(readEnvelope(created)).toEqual({ ok: true, data: { path: "Assets/Scripts/Spinner.cs", created: true } });

    const attached = await call("attach-behavior", { targetName: "Crate", behaviorName: "Spinner" });
    expect(attached.structuredContent).toEqual({
      ok: true,
      data: { componentName: "Spinner", alreadyAttached: false },
    });
  });

  it("reports the configured catalog in capabilities", async () => {
    const envelope = readEnvelope(await call("capabilities", {}));
    expect(envelope).toMatchObject({
      ok: true,
      data: {
        pipeline: "legacy",
        templates: ["emissive", "fabric", "glass", "metal", "plastic", "skin", "wood"],
        renderModes: ["opaque", "cutout", "transparent"],
        scaffoldKinds: ["behaviour", "editor", "editorWindow", "plain", "scriptable"],
      },
    });
  });
});
