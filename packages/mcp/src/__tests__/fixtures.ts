import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Material, ShadingBackend } from "@editor-bridge/core";
import { DEFAULT_CONFIG } from "../config.js";
import { createBehaviorRegistry } from "../editor/behaviors.js";
import { SceneSeedSchema, createMemoryScene, type MemoryScene } from "../editor/scene.js";
import { createEditorBridgeServer, createEditorContext } from "../index.js";
import { createSilentLogger } from "../logger.js";
import type { CommandContext, CommandRouter } from "../router.js";

export function createSceneSeed() {
  return SceneSeedSchema.parse({
    objects: [
      { name: "Player", renderer: true, components: ["Transform"] },
      { name: "Crate", renderer: true },
      { name: "Main Camera", components: ["Transform", "Camera"] },
    ],
    behaviors: [
      { name: "PlayerController", properties: { speed: 5 } },
      { name: "Spinner" },
    ],
  });
}

export interface TestWorkspace {
  dir: string;
  assetRoot: string;
  context: CommandContext;
  router: CommandRouter;
  scene: MemoryScene;
  /** Path relative to the asset root, forward slashes. */
  file(relativePath: string): string;
  write(relativePath: string, content: string): Promise<void>;
  read(relativePath: string): Promise<string>;
  writeMaterial(relativePath: string, material: Material): Promise<void>;
  readMaterial(relativePath: string): Promise<unknown>;
  cleanup(): Promise<void>;
}

export async function createTestWorkspace(options: { pipeline?: ShadingBackend } = {}): Promise<TestWorkspace> {
  const dir = await mkdtemp(join(tmpdir(), "editor-bridge-"));
  const assetRoot = join(dir, "Assets");
  await mkdir(assetRoot);

  const seed = createSceneSeed();
  const scene = createMemoryScene(seed);
  const context = await createEditorContext(
    { ...DEFAULT_CONFIG, assetRoot, pipeline: options.pipeline ?? "legacy" },
    createSilentLogger(),
    { scene, behaviors: createBehaviorRegistry(seed.behaviors) },
  );
  const { router } = createEditorBridgeServer(context);

  const file = (relativePath: string) => join(assetRoot, ...relativePath.split("/"));
  const write = async (relativePath: string, content: string) => {
    await mkdir(dirname(file(relativePath)), { recursive: true });
    await writeFile(file(relativePath), content, "utf8");
  };
  const read = (relativePath: string) => readFile(file(relativePath), "utf8");

  return {
    dir,
    assetRoot,
    context,
    router,
    scene,
    file,
    write,
    read,
    writeMaterial: (relativePath, material) => write(relativePath, `${JSON.stringify(material, null, 2)}\n`),
    readMaterial: async (relativePath) => JSON.parse(await read(relativePath)),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
