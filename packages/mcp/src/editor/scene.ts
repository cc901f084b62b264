import { z } from "zod";
import { BridgeError, describeError } from "@editor-bridge/core";
import type { AssetFileSystem, MaterialAssignment, SceneComponent, SceneGraph, SceneObject } from "./types.js";

export const SceneSeedSchema = z.object({
  objects: z
    .array(
      z.object({
        name: z.string().min(1),
        renderer: z.boolean().default(false),
        components: z.array(z.string().min(1)).default([]),
      }),
    )
    .default([]),
  behaviors: z
    .array(
      z.object({
        name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
        properties: z.record(z.unknown()).default({}),
      }),
    )
    .default([]),
});

export type SceneSeed = z.infer<typeof SceneSeedSchema>;

interface MutableSceneObject {
  name: string;
  components: SceneComponent[];
  renderer: { material: MaterialAssignment | null } | null;
}

export interface MemoryScene extends SceneGraph {
  objectNames(): string[];
}

/** Scene held in memory. Object names are unique and matched exactly. */
export function createMemoryScene(seed: Pick<SceneSeed, "objects"> = { objects: [] }): MemoryScene {
  const objects = new Map<string, MutableSceneObject>();
  for (const entry of seed.objects) {
    if (objects.has(entry.name)) {
      throw new Error(`Duplicate scene object "${entry.name}".`);
    }
    objects.set(entry.name, {
      name: entry.name,
      components: entry.components.map((type) => ({ type, properties: {} })),
      renderer: entry.renderer ? { material: null } : null,
    });
  }

  const requireObject = (name: string): MutableSceneObject => {
    const object = objects.get(name);
    if (!object) {
      throw new BridgeError("NotFound", `Object '${name}' not found.`);
    }
    return object;
  };

  return {
    findObject(name): SceneObject | undefined {
      return objects.get(name);
    },
    addComponent(objectName, component) {
      requireObject(objectName).components.push(component);
    },
    assignMaterial(objectName, assignment) {
      const object = requireObject(objectName);
      if (!object.renderer) {
        throw new BridgeError("NotFound", `Object '${objectName}' has no renderer.`);
      }
      object.renderer.material = assignment;
    },
    objectNames: () => Array.from(objects.keys()).sort(),
  };
}

export async function loadSceneSeed(fs: AssetFileSystem, file: string): Promise<SceneSeed> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readText(file));
  } catch (error) {
    throw new Error(`Failed to read scene file "${file}": ${describeError(error)}`);
  }
  const parsed = SceneSeedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid scene file "${file}": ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`,
    );
  }
  return parsed.data;
}
