import { access } from "node:fs/promises";
import { LARGE_PAYLOAD_THRESHOLD } from "@editor-bridge/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestWorkspace, type TestWorkspace } from "../__tests__/fixtures.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

const PLAYER_SCAFFOLD = [
  "using UnityEngine;",
  "using System.Collections;",
  "",
  "public class PlayerController : MonoBehaviour",
  "{",
  "    // Use this for initialization",
  "    void Start() {",
  "",
  "    }",
  "",
  "    // Update is called once per frame",
  "    void Update() {",
  "",
  "    }",
  "}",
  "",
].join("\n");

describe("text asset commands", () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createTestWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe("create-text-asset", () => {
    it("writes a behaviour scaffold into Scripts by default", async () => {
      const result = await workspace.router.dispatch("create-text-asset", { name: "PlayerController" });
      expect(result).toEqual({ ok: true, data: { path: "Assets/Scripts/PlayerController.cs", created: true } });
      expect(await workspace.read("Scripts/PlayerController.cs")).toBe(PLAYER_SCAFFOLD);
    });

    it("indents the scaffold inside a namespace", async () => {
      await workspace.router.dispatch("create-text-asset", {
        name: "EnemyData",
        kind: "ScriptableObject",
        namespace: "Game.AI",
        folder: "Assets/Data",
      });
      expect(await workspace.read("Data/EnemyData.cs")).toBe(
        [
          "using UnityEngine;",
          "using System.Collections;",
          "",
          "namespace Game.AI",
          "{",
          "    public class EnemyData : ScriptableObject",
          "    {",
          "    }",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("strips the source extension from the name and uses Scripts for the bare root", async () => {
      const result = await workspace.router.dispatch("create-text-asset", {
        name: "Enemy.cs",
        folder: "Assets",
        content: "// enemy\n",
      });
      expect(result).toEqual({ ok: true, data: { path: "Assets/Scripts/Enemy.cs", created: true } });
      expect(await workspace.read("Scripts/Enemy.cs")).toBe("// enemy\n");
    });

    it("rejects invalid names before touching the disk", async () => {
      const result = await workspace.router.dispatch("create-text-asset", { name: "1Player" });
      expect(result).toEqual({
        ok: false,
        error: {
          code: "InvalidName",
          message: "Invalid name: '1Player'. Use only letters, numbers and underscores, and do not start with a number.",
        },
      });
      expect(await exists(workspace.file("Scripts"))).toBe(false);
    });

    it("rejects a non-boolean overwrite flag", async () => {
      const result = await workspace.router.dispatch("create-text-asset", { name: "Player", overwrite: "yes" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("TypeMismatch");
      }
      expect(await exists(workspace.file("Scripts/Player.cs"))).toBe(false);
    });

    it("refuses to replace a file unless overwrite is set", async () => {
      await workspace.write("Scripts/Player.cs", "// original\n");

      const refused = await workspace.router.dispatch("create-text-asset", { name: "Player", content: "// new\n" });
      expect(refused).toEqual({
        ok: false,
        error: {
          code: "AlreadyExists",
          message: "File already exists at 'Assets/Scripts/Player.cs'. Use overwrite=true to replace it.",
        },
      });
      expect(await workspace.read("Scripts/Player.cs")).toBe("// original\n");

      const replaced = await workspace.router.dispatch("create-text-asset", {
        name: "Player",
        content: "// new\n",
        overwrite: true,
      });
      expect(replaced).toEqual({ ok: true, data: { path: "Assets/Scripts/Player.cs", created: false } });
      expect(await workspace.read("Scripts/Player.cs")).toBe("// new\n");
    });

    it("accepts encoded content", async () => {
      const body = "// ünïcode ✓\n";
      await workspace.router.dispatch("create-text-asset", {
        name: "Glyphs",
        content: Buffer.from(body, "utf8").toString("base64"),
        contentEncoded: true,
      });
      expect(await workspace.read("Scripts/Glyphs.cs")).toBe(body);
    });
  });

  describe("view-text-asset", () => {
    it("returns small files inline", async () => {
      await workspace.write("Scripts/Small.cs", "class Small {}\n");
      const result = await workspace.router.dispatch("view-text-asset", { path: "Scripts\\Small.cs" });
      expect(result).toEqual({
        ok: true,
        data: { exists: true, path: "Assets/Scripts/Small.cs", content: "class Small {}\n", contentEncoded: false },
      });
    });

    it("encodes files over the threshold", async () => {
      const body = `// ${"x".repeat(LARGE_PAYLOAD_THRESHOLD)}`;
      await workspace.write("Scripts/Large.cs", body);
      const result = await workspace.router.dispatch("view-text-asset", { path: "Assets/Scripts/Large.cs" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data.contentEncoded).toBe(true);
        expect(result.data).not.toHaveProperty("content");
        expect(result.data.encodedContent).toBe(Buffer.from(body, "utf8").toString("base64"));
      }
    });

    it("reports missing files according to requireExists", async () => {
      await expect(workspace.router.dispatch("view-text-asset", { path: "Scripts/Nope.cs" })).resolves.toEqual({
        ok: false,
        error: { code: "NotFound", message: "File not found: Assets/Scripts/Nope.cs" },
      });
      await expect(
        workspace.router.dispatch("view-text-asset", { path: "Scripts/Nope.cs", requireExists: false }),
      ).resolves.toEqual({ ok: true, data: { exists: false, path: "Assets/Scripts/Nope.cs" } });
    });

    it("refuses paths that leave the asset root", async () => {
      const result = await workspace.router.dispatch("view-text-asset", { path: "../secrets.txt" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("InvalidPath");
      }
    });
  });

  describe("update-text-asset", () => {
    it("replaces an existing file", async () => {
      await workspace.write("Scripts/Player.cs", "// v1\n");
      const result = await workspace.router.dispatch("update-text-asset", { path: "Scripts/Player.cs", content: "// v2\n" });
      expect(result).toEqual({ ok: true, data: { path: "Assets/Scripts/Player.cs", created: false } });
      expect(await workspace.read("Scripts/Player.cs")).toBe("// v2\n");
    });

    it("fails on a missing directory unless asked to create it", async () => {
      const refused = await workspace.router.dispatch("update-text-asset", {
        path: "Gameplay/AI/Brain.cs",
        content: "// brain\n",
        createIfMissing: true,
      });
      expect(refused).toEqual({
        ok: false,
        error: { code: "NotFound", message: "Directory does not exist: Assets/Gameplay/AI" },
      });

      const created = await workspace.router.dispatch("update-text-asset", {
        path: "Gameplay/AI/Brain.cs",
        content: "// brain\n",
        createIfMissing: true,
        createFolderIfMissing: true,
      });
      expect(created).toEqual({ ok: true, data: { path: "Assets/Gameplay/AI/Brain.cs", created: true } });
      expect(await workspace.read("Gameplay/AI/Brain.cs")).toBe("// brain\n");
    });

    it("creates no folder when the missing file may not be created", async () => {
      const result = await workspace.router.dispatch("update-text-asset", {
        path: "New/Thing.cs",
        content: "// thing\n",
        createFolderIfMissing: true,
        createIfMissing: false,
      });
      expect(result).toEqual({
        ok: false,
        error: { code: "NotFound", message: "File not found: Assets/New/Thing.cs" },
      });
      expect(await exists(workspace.file("New"))).toBe(false);
    });

    it("fails on a missing file unless createIfMissing is set", async () => {
      await workspace.write("Scripts/Other.cs", "");
      await expect(
        workspace.router.dispatch("update-text-asset", { path: "Scripts/Player.cs", content: "// v1\n" }),
      ).resolves.toEqual({
        ok: false,
        error: { code: "NotFound", message: "File not found: Assets/Scripts/Player.cs" },
      });
      expect(await exists(workspace.file("Scripts/Player.cs"))).toBe(false);
    });

    it("decodes encoded content and leaves the file alone when decoding fails", async () => {
      await workspace.write("Scripts/Player.cs", "// v1\n");
      const body = "y".repeat(LARGE_PAYLOAD_THRESHOLD + 1);

      const updated = await workspace.router.dispatch("update-text-asset", {
        path: "Scripts/Player.cs",
        content: Buffer.from(body, "utf8").toString("base64"),
        contentEncoded: true,
      });
      expect(updated.ok).toBe(true);
      expect(await workspace.read("Scripts/Player.cs")).toBe(body);

      const broken = await workspace.router.dispatch("update-text-asset", {
        path: "Scripts/Player.cs",
        content: "%%% not base64 %%%",
        contentEncoded: true,
      });
      expect(broken).toEqual({
        ok: false,
        error: { code: "DecodeFailed", message: "Failed to decode content: payload is not valid base64." },
      });
      expect(await workspace.read("Scripts/Player.cs")).toBe(body);
    });

    it("requires content", async () => {
      await expect(workspace.router.dispatch("update-text-asset", { path: "Scripts/Player.cs" })).resolves.toEqual({
        ok: false,
        error: { code: "MissingParameter", message: "Parameter 'content' is required." },
      });
    });
  });

  describe("list-text-assets", () => {
    it("lists source files recursively as logical paths", async () => {
      await workspace.write("Scripts/Player.cs", "");
      await workspace.write("Scripts/AI/Brain.cs", "");
      await workspace.write("Scripts/readme.txt", "");
      await workspace.write("Editor/Tools.cs", "");

      await expect(workspace.router.dispatch("list-text-assets", {})).resolves.toEqual({
        ok: true,
        data: { paths: ["Assets/Editor/Tools.cs", "Assets/Scripts/AI/Brain.cs", "Assets/Scripts/Player.cs"] },
      });
      await expect(workspace.router.dispatch("list-text-assets", { folderPath: "assets/Scripts/AI" })).resolves.toEqual({
        ok: true,
        data: { paths: ["Assets/Scripts/AI/Brain.cs"] },
      });
    });

    it("reports a missing folder", async () => {
      await expect(workspace.router.dispatch("list-text-assets", { folderPath: "Plugins" })).resolves.toEqual({
        ok: false,
        error: { code: "NotFound", message: "Folder not found: Assets/Plugins" },
      });
    });
  });
});
