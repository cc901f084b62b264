import {
  BridgeError,
  applyMaterialWrites,
  clamp01,
  classifyShader,
  createMaterial,
  ensureDirectory,
  findTextureSlot,
  instantiateTemplate,
  isRenderMode,
  multiplyColor,
  normalizeAssetPath,
  param,
  renderModeWrites,
  resolveProperty,
  resolveScalarProperty,
  toRgba,
  type Material,
  type MaterialWrite,
  type NormalizedAssetPath,
  type ShaderCatalog,
} from "@editor-bridge/core";
import { MATERIAL_EXTENSION } from "../editor/fileAssetStore.js";
import { defineCommand, type CommandContext, type RegisteredCommand } from "../router.js";

export const DEFAULT_MATERIAL_FOLDER = "Materials";

/**
 * Property names a material can take: those its shader declares, or the ones
 * already stored on it when the shader is not in the catalog.
 */
export function materialCapabilities(material: Material, shaders: ShaderCatalog): ReadonlySet<string> {
  if (shaders.has(material.shader)) {
    return shaders.capabilities(material.shader);
  }
  return new Set([...Object.keys(material.floats), ...Object.keys(material.colors), ...Object.keys(material.textures)]);
}

function validateMaterialName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === "" || trimmed === "." || trimmed === ".." || /[\\/]/.test(trimmed)) {
    throw new BridgeError("InvalidName", `Invalid material name: '${name}'. Names cannot be empty or contain path separators.`);
  }
  return trimmed;
}

function materialFile(folderPath: string, materialName: string, context: CommandContext) {
  const folder = normalizeAssetPath(folderPath, context.roots);
  const file = normalizeAssetPath(`${folder.logicalPath}/${materialName}${MATERIAL_EXTENSION}`, context.roots);
  return { folder, file };
}

async function loadMaterialOrFail(materialPath: string, context: CommandContext) {
  const path = normalizeAssetPath(materialPath, context.roots);
  const material = await context.assets.loadMaterial(path);
  if (!material) {
    throw new BridgeError("NotFound", `Material not found at path: ${path.logicalPath}`);
  }
  return { path, material };
}

const setMaterialParams = {
  targetName: param.required("targetName", "string", "Name of the scene object whose renderer receives the material."),
  materialName: param.optional("materialName", "string", "Shared material under Materials/; omitted or empty means a per-object instance material."),
  createIfMissing: param.withDefault("createIfMissing", "boolean", true, "Create the named material when it does not exist."),
  color: param.optional("color", "color", "Base color as [r, g, b] or [r, g, b, a]."),
};

export const setMaterial = defineCommand({
  name: "set-material",
  description: "Assign a shared or instance material to an object's renderer, optionally setting its base color.",
  params: Object.values(setMaterialParams),
  decode: (params) => ({
    targetName: setMaterialParams.targetName.read(params),
    materialName: setMaterialParams.materialName.read(params),
    createIfMissing: setMaterialParams.createIfMissing.read(params),
    color: setMaterialParams.color.read(params),
  }),
  async run(input, context) {
    const target = context.scene.findObject(input.targetName);
    if (!target) {
      throw new BridgeError("NotFound", `Object '${input.targetName}' not found.`);
    }
    if (!target.renderer) {
      throw new BridgeError("NotFound", `Object '${input.targetName}' has no renderer.`);
    }

    const shader = context.shaders.defaultLitShader(context.pipeline);
    let material: Material;
    let path: NormalizedAssetPath | null = null;
    let dirty = false;

    // An empty name asks for an instance material, like an omitted one.
    if (input.materialName !== undefined && input.materialName !== "") {
      const name = validateMaterialName(input.materialName);
      const { folder, file } = materialFile(DEFAULT_MATERIAL_FOLDER, name, context);
      path = file;
      const existing = await context.assets.loadMaterial(file);
      if (existing) {
        material = existing;
      } else if (input.createIfMissing) {
        await ensureDirectory(context.fs, folder.physicalPath, folder.logicalPath);
        material = createMaterial(name, shader);
        dirty = true;
      } else {
        throw new BridgeError("NotFound", `Material '${name}' not found and createIfMissing is false.`);
      }
    } else {
      material = createMaterial(`${target.name} (Instance)`, shader);
    }

    if (input.color) {
      const property = resolveScalarProperty(
        "color",
        classifyShader(material.shader),
        materialCapabilities(material, context.shaders),
      );
      if (property) {
        material = applyMaterialWrites(material, [{ kind: "color", property, value: toRgba(input.color) }]);
        dirty = true;
      } else {
        context.logger.debug({ shader: material.shader }, "material has no color property");
      }
    }

    if (path && dirty) {
      await context.assets.saveMaterial(path, material);
    }
    const logicalPath = path ? path.logicalPath : null;
    context.scene.assignMaterial(target.name, { path: logicalPath, material });
    return { materialName: material.name, path: logicalPath };
  },
});

const propertyParams = {
  materialPath: param.required("materialPath", "string", "Asset path of the material."),
  color: param.optional("color", "color", "Base color as [r, g, b] or [r, g, b, a]."),
  metallic: param.optional("metallic", "number", "Metallic amount, clamped to 0..1."),
  smoothness: param.optional("smoothness", "number", "Smoothness, clamped to 0..1."),
  normalScale: param.optional("normalScale", "number", "Normal map strength."),
  occlusionStrength: param.optional("occlusionStrength", "number", "Occlusion strength, clamped to 0..1."),
  heightScale: param.optional("heightScale", "number", "Height map scale."),
  emissionColor: param.optional("emissionColor", "color", "Emission color; enables emission."),
  emissionIntensity: param.withDefault("emissionIntensity", "number", 1, "Multiplier applied to every emission color channel."),
};

interface ScalarRequest {
  slot: string;
  write: (property: string) => MaterialWrite;
}

export const setMaterialProperties = defineCommand({
  name: "set-material-properties",
  description:
    "Set scalar material properties. Properties the material's shader does not declare are skipped and listed in `skipped`.",
  params: Object.values(propertyParams),
  decode: (params) => ({
    materialPath: propertyParams.materialPath.read(params),
    color: propertyParams.color.read(params),
    metallic: propertyParams.metallic.read(params),
    smoothness: propertyParams.smoothness.read(params),
    normalScale: propertyParams.normalScale.read(params),
    occlusionStrength: propertyParams.occlusionStrength.read(params),
    heightScale: propertyParams.heightScale.read(params),
    emissionColor: propertyParams.emissionColor.read(params),
    emissionIntensity: propertyParams.emissionIntensity.read(params),
  }),
  async run(input, context) {
    const { path, material } = await loadMaterialOrFail(input.materialPath, context);
    const backend = classifyShader(material.shader);
    const capabilities = materialCapabilities(material, context.shaders);

    const float = (value: number) => (property: string): MaterialWrite => ({ kind: "float", property, value });
    const requests: ScalarRequest[] = [];
    if (input.color) {
      const color = toRgba(input.color);
      requests.push({ slot: "color", write: (property) => ({ kind: "color", property, value: color }) });
    }
    if (input.metallic !== undefined) requests.push({ slot: "metallic", write: float(clamp01(input.metallic)) });
    if (input.smoothness !== undefined) requests.push({ slot: "smoothness", write: float(clamp01(input.smoothness)) });
    if (input.normalScale !== undefined) requests.push({ slot: "normalScale", write: float(input.normalScale) });
    if (input.occlusionStrength !== undefined) {
      requests.push({ slot: "occlusionStrength", write: float(clamp01(input.occlusionStrength)) });
    }
    if (input.heightScale !== undefined) requests.push({ slot: "heightScale", write: float(input.heightScale) });
    if (input.emissionColor) {
      const emission = multiplyColor(toRgba(input.emissionColor), input.emissionIntensity);
      requests.push({ slot: "emissionColor", write: (property) => ({ kind: "color", property, value: emission }) });
    }

    const writes: MaterialWrite[] = [];
    const applied: Array<{ slot: string; property: string }> = [];
    const skipped: string[] = [];
    for (const request of requests) {
      const property = resolveScalarProperty(request.slot, backend, capabilities);
      if (!property) {
        skipped.push(request.slot);
        continue;
      }
      writes.push(request.write(property));
      applied.push({ slot: request.slot, property });
    }
    if (input.emissionColor) {
      writes.push({ kind: "keyword", keyword: "_EMISSION", enabled: true });
    }

    if (skipped.length > 0) {
      context.logger.debug({ shader: material.shader, skipped }, "unsupported properties skipped");
    }
    if (writes.length > 0) {
      await context.assets.saveMaterial(path, applyMaterialWrites(material, writes));
    }
    return { materialName: material.name, applied, skipped };
  },
});

const textureParams = {
  materialPath: param.required("materialPath", "string", "Asset path of the material."),
  slotType: param.required(
    "slotType",
    "string",
    "Texture slot: albedo, normal, metallic, smoothness, occlusion, height, emission, detail, detail_albedo, detail_normal (aliases accepted).",
  ),
  texturePath: param.required("texturePath", "string", "Asset path of the texture image."),
  tiling: param.optional("tiling", "vector2", "Texture scale as [x, y]."),
  offset: param.optional("offset", "vector2", "Texture offset as [x, y]."),
};

export const setMaterialTexture = defineCommand({
  name: "set-material-texture",
  description: "Bind a texture to an abstract slot, resolved to the property name of the material's render pipeline.",
  params: Object.values(textureParams),
  decode: (params) => ({
    materialPath: textureParams.materialPath.read(params),
    slotType: textureParams.slotType.read(params),
    texturePath: textureParams.texturePath.read(params),
    tiling: textureParams.tiling.read(params),
    offset: textureParams.offset.read(params),
  }),
  async run(input, context) {
    const { path, material } = await loadMaterialOrFail(input.materialPath, context);
    const texturePath = normalizeAssetPath(input.texturePath, context.roots);
    const texture = await context.assets.loadTexture(texturePath);
    if (!texture) {
      throw new BridgeError("NotFound", `Texture not found at path: ${texturePath.logicalPath}`);
    }

    const backend = classifyShader(material.shader);
    const property = resolveProperty(input.slotType, backend, materialCapabilities(material, context.shaders));
    if (!property) {
      const known = findTextureSlot(input.slotType) !== null;
      throw new BridgeError(
        "UnsupportedSlot",
        known
          ? `Texture type '${input.slotType}' not supported for this material.`
          : `Unknown texture type '${input.slotType}'.`,
        `shader: ${material.shader} (${backend})`,
      );
    }

    const previous = material.textures[property];
    const next = applyMaterialWrites(material, [
      {
        kind: "texture",
        property,
        value: {
          texture: texture.path,
          scale: input.tiling ?? previous?.scale ?? [1, 1],
          offset: input.offset ?? previous?.offset ?? [0, 0],
        },
      },
    ]);
    await context.assets.saveMaterial(path, next);
    return { materialName: next.name, textureName: texture.name, property };
  },
});

const templateParams = {
  materialName: param.required("materialName", "string", "Name of the new material."),
  templateName: param.required("templateName", "string", "metal, plastic, wood, glass, emissive, fabric or skin."),
  savePath: param.withDefault("savePath", "string", DEFAULT_MATERIAL_FOLDER, "Folder the material is saved in."),
  overwrite: param.withDefault("overwrite", "boolean", true, "Replace an existing material file."),
};

export const createMaterialFromTemplate = defineCommand({
  name: "create-material-from-template",
  description: "Create a material from a named appearance template for the configured render pipeline.",
  params: Object.values(templateParams),
  decode: (params) => ({
    materialName: templateParams.materialName.read(params),
    templateName: templateParams.templateName.read(params),
    savePath: templateParams.savePath.read(params),
    overwrite: templateParams.overwrite.read(params),
  }),
  async run(input, context) {
    const name = validateMaterialName(input.materialName);
    const shader = context.shaders.defaultLitShader(context.pipeline);
    const writes = instantiateTemplate(input.templateName, context.pipeline, {
      capabilities: context.shaders.capabilities(shader),
    });

    const { folder, file } = materialFile(input.savePath, name, context);
    if (!input.overwrite && (await context.fs.isFile(file.physicalPath))) {
      throw new BridgeError("AlreadyExists", `Material already exists at '${file.logicalPath}'. Use overwrite=true to replace it.`);
    }
    await ensureDirectory(context.fs, folder.physicalPath, folder.logicalPath);
    const material = applyMaterialWrites(createMaterial(name, shader), writes);
    await context.assets.saveMaterial(file, material);
    return { materialName: material.name, path: file.logicalPath };
  },
});

/** Shader for a requested type under a pipeline; "Standard" means the pipeline's default lit shader. */
export function resolveShaderName(shaderType: string, context: Pick<CommandContext, "pipeline" | "shaders">): string {
  const { pipeline, shaders } = context;
  if (shaderType.trim().toLowerCase() === "standard") {
    return shaders.defaultLitShader(pipeline);
  }
  if (pipeline === "legacy" || shaders.has(shaderType)) {
    return shaderType;
  }
  return pipeline === "universal" ? `Universal Render Pipeline/${shaderType}` : `HDRP/${shaderType}`;
}

const advancedParams = {
  materialName: param.required("materialName", "string", "Name of the material."),
  shaderType: param.withDefault("shaderType", "string", "Standard", "Shader name, relative to the pipeline's shader family."),
  renderMode: param.withDefault("renderMode", "string", "opaque", "opaque, cutout or transparent; anything else is opaque."),
  savePath: param.withDefault("savePath", "string", DEFAULT_MATERIAL_FOLDER, "Folder the material is saved in."),
  overwrite: param.withDefault("overwrite", "boolean", true, "Update an existing material instead of failing."),
};

export const createAdvancedMaterial = defineCommand({
  name: "create-advanced-material",
  description: "Create or update a material with an explicit shader and render mode.",
  params: Object.values(advancedParams),
  decode: (params) => ({
    materialName: advancedParams.materialName.read(params),
    shaderType: advancedParams.shaderType.read(params),
    renderMode: advancedParams.renderMode.read(params),
    savePath: advancedParams.savePath.read(params),
    overwrite: advancedParams.overwrite.read(params),
  }),
  async run(input, context) {
    const name = validateMaterialName(input.materialName);
    const shader = resolveShaderName(input.shaderType, context);
    if (!context.shaders.has(shader)) {
      throw new BridgeError("NotFound", `Shader '${input.shaderType}' not found.`, `Looked up '${shader}'.`);
    }
    const modeKey = input.renderMode.trim().toLowerCase();
    const renderMode = isRenderMode(modeKey) ? modeKey : "opaque";

    const { folder, file } = materialFile(input.savePath, name, context);
    const existing = await context.assets.loadMaterial(file);
    if (existing && !input.overwrite) {
      throw new BridgeError("AlreadyExists", `Material already exists at '${file.logicalPath}'. Use overwrite=true to update it.`);
    }
    await ensureDirectory(context.fs, folder.physicalPath, folder.logicalPath);
    const base = existing ? { ...existing, shader } : createMaterial(name, shader);
    const material = applyMaterialWrites(base, renderModeWrites(renderMode));
    await context.assets.saveMaterial(file, material);
    return { materialName: material.name, path: file.logicalPath, shader, renderMode };
  },
});

export const materialCommands: RegisteredCommand[] = [
  setMaterial,
  setMaterialProperties,
  setMaterialTexture,
  createMaterialFromTemplate,
  createAdvancedMaterial,
];
