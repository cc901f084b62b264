import { BridgeError, param } from "@editor-bridge/core";
import { describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "./config.js";
import { createEditorContext } from "./index.js";
import { createSilentLogger } from "./logger.js";
import { createCommandRouter, defineCommand, type RegisteredCommand } from "./router.js";

async function createRouter(commands: RegisteredCommand[]) {
  const context = await createEditorContext(DEFAULT_CONFIG, createSilentLogger());
  return createCommandRouter(commands, context);
}

const nameParam = param.required("name", "string", "Name.");

function throwingCommand(name: string, error: unknown) {
  return defineCommand({
    name,
    description: "Throws.",
    params: [],
    decode: () => ({}),
    run: async () => {
      throw error;
    },
  });
}

describe("command router", () => {
  it("wraps handler data in a success envelope", async () => {
    const router = await createRouter([
      defineCommand({
        name: "greet",
        description: "Greets.",
        params: [nameParam],
        decode: (params) => ({ name: nameParam.read(params) }),
        run: async (input) => ({ greeting: `hello ${input.name}` }),
      }),
    ]);

    await expect(router.dispatch("greet", { name: "Ada" })).resolves.toEqual({
      ok: true,
      data: { greeting: "hello Ada" },
    });
  });

  it("reports unknown commands", async () => {
    const router = await createRouter([]);
    await expect(router.dispatch("explode", {})).resolves.toEqual({
      ok: false,
      error: { code: "UnknownCommand", message: "Unknown command: explode" },
    });
  });

  it("keeps the code, message and detail of bridge errors", async () => {
    const router = await createRouter([
      throwingCommand("fails", new BridgeError("NotFound", "Object 'Ghost' not found.", "scene has 3 objects")),
    ]);
    await expect(router.dispatch("fails")).resolves.toEqual({
      ok: false,
      error: { code: "NotFound", message: "Object 'Ghost' not found.", detail: "scene has 3 objects" },
    });
  });

  it("converts other faults to Unknown", async () => {
    const router = await createRouter([throwingCommand("crash", new TypeError("boom")), throwingCommand("odd", 42)]);

    const crashed = await router.dispatch("crash");
    expect(crashed.ok).toBe(false);
    if (!crashed.ok) {
      expect(crashed.error.code).toBe("Unknown");
      expect(crashed.error.message).toBe("boom");
      expect(crashed.error.detail).toContain("TypeError: boom");
    }

    await expect(router.dispatch("odd")).resolves.toEqual({
      ok: false,
      error: { code: "Unknown", message: "Command failed.", detail: "42" },
    });
  });

  it("decodes every parameter before the handler runs", async () => {
    const run = vi.fn(async () => ({}));
    const router = await createRouter([
      defineCommand({
        name: "guarded",
        description: "Guarded.",
        params: [nameParam],
        decode: (params) => ({ name: nameParam.read(params) }),
        run,
      }),
    ]);

    const result = await router.dispatch("guarded", { name: 7 });
    expect(result).toEqual({
      ok: false,
      error: {
        code: "TypeMismatch",
        message: "Parameter 'name' must be a string, got number.",
        detail: "Expected string, received number",
      },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("runs commands one at a time in arrival order", async () => {
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const router = await createRouter([
      defineCommand({
        name: "slow",
        description: "Waits for the gate.",
        params: [],
        decode: () => ({}),
        run: async () => {
          events.push("slow:start");
          await gate;
          events.push("slow:end");
          return {};
        },
      }),
      defineCommand({
        name: "fast",
        description: "Returns at once.",
        params: [],
        decode: () => ({}),
        run: async () => {
          events.push("fast");
          return {};
        },
      }),
    ]);

    const slow = router.dispatch("slow");
    const fast = router.dispatch("fast");
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(events).toEqual(["slow:start"]);

    release();
    await Promise.all([slow, fast]);
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("keeps serving after a failed command", async () => {
    const router = await createRouter([
      throwingCommand("crash", new Error("first")),
      defineCommand({ name: "ok", description: "Ok.", params: [], decode: () => ({}), run: async () => ({ done: true }) }),
    ]);
    const [first, second] = await Promise.all([router.dispatch("crash"), router.dispatch("ok")]);
    expect(first.ok).toBe(false);
    expect(second).toEqual({ ok: true, data: { done: true } });
  });

  it("lists commands by name and rejects duplicates", async () => {
    const router = await createRouter([throwingCommand("zeta", 1), throwingCommand("alpha", 1)]);
    expect(router.list().map((command) => command.name)).toEqual(["alpha", "zeta"]);
    await expect(createRouter([throwingCommand("same", 1), throwingCommand("same", 2)])).rejects.toThrow(
      'Command "same" is registered twice.',
    );
  });
});
