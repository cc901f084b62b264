import { z } from "zod";
import type { ColorTuple, Vector2 } from "./params.js";

export type Rgba = [number, number, number, number];

export const GLOBAL_ILLUMINATION_MODES = ["none", "realtimeEmissive", "bakedEmissive"] as const;

export type GlobalIlluminationMode = (typeof GLOBAL_ILLUMINATION_MODES)[number];

export interface TextureBinding {
  texture: string;
  scale: Vector2;
  offset: Vector2;
}

export interface Material {
  name: string;
  shader: string;
  floats: Record<string, number>;
  colors: Record<string, Rgba>;
  textures: Record<string, TextureBinding>;
  keywords: string[];
  renderQueue: number;
  globalIllumination: GlobalIlluminationMode;
}

export type MaterialWrite =
  | { kind: "float"; property: string; value: number }
  | { kind: "color"; property: string; value: Rgba }
  | { kind: "texture"; property: string; value: TextureBinding }
  | { kind: "keyword"; keyword: string; enabled: boolean }
  | { kind: "renderQueue"; value: number }
  | { kind: "globalIllumination"; value: GlobalIlluminationMode };

const Vector2Schema = z.tuple([z.number(), z.number()]);

export const MaterialSchema = z.object({
  name: z.string(),
  shader: z.string().min(1),
  floats: z.record(z.number()).default({}),
  colors: z.record(z.tuple([z.number(), z.number(), z.number(), z.number()])).default({}),
  textures: z
    .record(
      z.object({
        texture: z.string().min(1),
        scale: Vector2Schema.default([1, 1]),
        offset: Vector2Schema.default([0, 0]),
      }),
    )
    .default({}),
  keywords: z.array(z.string()).default([]),
  renderQueue: z.number().int().default(-1),
  globalIllumination: z.enum(GLOBAL_ILLUMINATION_MODES).default("none"),
});

export function createMaterial(name: string, shader: string): Material {
  return {
    name,
    shader,
    floats: {},
    colors: {},
    textures: {},
    keywords: [],
    renderQueue: -1,
    globalIllumination: "none",
  };
}

export function toRgba(color: ColorTuple): Rgba {
  return [color[0], color[1], color[2], color.length === 4 ? color[3] : 1];
}

export function multiplyColor(color: Rgba, factor: number): Rgba {
  return [color[0] * factor, color[1] * factor, color[2] * factor, color[3] * factor];
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function setKeyword(keywords: string[], keyword: string, enabled: boolean): string[] {
  const next = keywords.filter((item) => item !== keyword);
  if (enabled) {
    next.push(keyword);
  }
  return next.sort((a, b) => a.localeCompare(b));
}

/** Applies writes in order and returns a new material; a later write to the same key wins. */
export function applyMaterialWrites(material: Material, writes: readonly MaterialWrite[]): Material {
  const next: Material = {
    ...material,
    floats: { ...material.floats },
    colors: { ...material.colors },
    textures: { ...material.textures },
    keywords: [...material.keywords],
  };
  for (const write of writes) {
    switch (write.kind) {
      case "float":
        next.floats[write.property] = write.value;
        break;
      case "color":
        next.colors[write.property] = write.value;
        break;
      case "texture":
        next.textures[write.property] = write.value;
        break;
      case "keyword":
        next.keywords = setKeyword(next.keywords, write.keyword, write.enabled);
        break;
      case "renderQueue":
        next.renderQueue = write.value;
        break;
      case "globalIllumination":
        next.globalIllumination = write.value;
        break;
    }
  }
  return next;
}
