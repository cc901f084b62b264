export { BridgeError, asBridgeError, describeError, isBridgeError } from "./errors.js";
export type { BridgeErrorCode } from "./errors.js";

export {
  ParamKindSchemas,
  decodeParamValue,
  optionalParam,
  param,
  requireParam,
} from "./params.js";
export type {
  AnyParamSpec,
  ColorTuple,
  ParamBag,
  ParamKind,
  ParamSpec,
  ParamValueByKind,
  Vector2,
} from "./params.js";

export { LARGE_PAYLOAD_THRESHOLD, decodePayload, encodeIfLarge, toTransportRecord } from "./payload.js";
export type { EncodedPayload, PayloadTransportRecord } from "./payload.js";

export {
  ensureDirectory,
  logicalBasename,
  logicalDirname,
  normalizeAssetPath,
  stripExtension,
  toLogicalPath,
} from "./paths.js";
export type { AssetRoots, DirectoryMaker, NormalizedAssetPath } from "./paths.js";

export {
  SHADING_BACKENDS,
  ShaderCatalogDataSchema,
  ShadingBackendSchema,
  classifyShader,
  createShaderCatalog,
  getShaderCatalog,
} from "./shading.js";
export type { ShaderCatalog, ShaderCatalogData, ShadingBackend } from "./shading.js";

export {
  SlotTableSchema,
  createPropertyTables,
  findScalarSlot,
  findTextureSlot,
  getPropertyTables,
  listScalarSlots,
  listTextureSlots,
  resolveProperty,
  resolveScalarProperty,
} from "./resolver.js";
export type { PropertyTables, ScalarSlotDescriptor, ScalarValueKind, SlotDescriptor, SlotTableData } from "./resolver.js";

export {
  RENDER_MODES,
  TemplateTableSchema,
  createTemplateTables,
  getTemplateTables,
  instantiateTemplate,
  isRenderMode,
  listTemplates,
  renderModeWrites,
} from "./templates.js";
export type { InstantiateOptions, RenderMode, TemplateEntry, TemplateTableData, TemplateTables } from "./templates.js";

export {
  GLOBAL_ILLUMINATION_MODES,
  MaterialSchema,
  applyMaterialWrites,
  clamp01,
  createMaterial,
  multiplyColor,
  toRgba,
} from "./material.js";
export type { GlobalIlluminationMode, Material, MaterialWrite, Rgba, TextureBinding } from "./material.js";
