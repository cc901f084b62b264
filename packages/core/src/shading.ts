import { z } from "zod";
import shaderTable from "../data/shaders.json" with { type: "json" };

export const SHADING_BACKENDS = ["legacy", "universal", "highDefinition"] as const;

export const ShadingBackendSchema = z.enum(SHADING_BACKENDS);

export type ShadingBackend = z.infer<typeof ShadingBackendSchema>;

export const ShaderCatalogDataSchema = z.object({
  defaultLit: z.object({
    legacy: z.string().min(1),
    universal: z.string().min(1),
    highDefinition: z.string().min(1),
  }),
  shaders: z.record(z.array(z.string().min(1))),
});

export type ShaderCatalogData = z.infer<typeof ShaderCatalogDataSchema>;

export interface ShaderCatalog {
  has(shader: string): boolean;
  /** Property names the shader declares; empty for unknown shaders. */
  capabilities(shader: string): ReadonlySet<string>;
  defaultLitShader(backend: ShadingBackend): string;
  names(): string[];
}

const EMPTY_CAPABILITIES: ReadonlySet<string> = new Set();

/** One-time classification of a shader name into its render-pipeline family. */
export function classifyShader(shaderName: string): ShadingBackend {
  if (shaderName.includes("Universal Render Pipeline")) {
    return "universal";
  }
  if (shaderName.includes("HDRP") || shaderName.includes("High Definition")) {
    return "highDefinition";
  }
  return "legacy";
}

export function createShaderCatalog(data: ShaderCatalogData): ShaderCatalog {
  const shaders = new Map<string, ReadonlySet<string>>(
    Object.entries(data.shaders).map(([name, properties]) => [name, new Set(properties)]),
  );
  for (const backend of SHADING_BACKENDS) {
    if (!shaders.has(data.defaultLit[backend])) {
      throw new Error(`Default lit shader "${data.defaultLit[backend]}" for ${backend} is not in the catalog.`);
    }
  }
  return {
    has: (shader) => shaders.has(shader),
    capabilities: (shader) => shaders.get(shader) ?? EMPTY_CAPABILITIES,
    defaultLitShader: (backend) => data.defaultLit[backend],
    names: () => Array.from(shaders.keys()).sort((a, b) => a.localeCompare(b)),
  };
}

let builtinCatalog: ShaderCatalog | null = null;

export function getShaderCatalog(): ShaderCatalog {
  if (!builtinCatalog) {
    builtinCatalog = createShaderCatalog(ShaderCatalogDataSchema.parse(shaderTable));
  }
  return builtinCatalog;
}
