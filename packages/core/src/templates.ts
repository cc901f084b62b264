import { z } from "zod";
import templateTable from "../data/templates.json" with { type: "json" };
import { BridgeError } from "./errors.js";
import { GLOBAL_ILLUMINATION_MODES, type MaterialWrite, type Rgba } from "./material.js";
import { findScalarSlot, getPropertyTables, resolveScalarProperty, type PropertyTables } from "./resolver.js";
import { getShaderCatalog, type ShadingBackend } from "./shading.js";

const WriteValueSchema = z.union([z.number(), z.array(z.number()).min(3).max(4)]);

const TemplateEntrySchema = z.union([
  z.object({ slot: z.string().min(1), value: WriteValueSchema }).strict(),
  z.object({ property: z.string().min(1), value: WriteValueSchema }).strict(),
  z.object({ keyword: z.string().min(1), enabled: z.boolean() }).strict(),
  z.object({ renderQueue: z.number().int() }).strict(),
  z.object({ globalIllumination: z.enum(GLOBAL_ILLUMINATION_MODES) }).strict(),
]);

export const TemplateTableSchema = z.object({
  templates: z.record(z.array(TemplateEntrySchema).min(1)),
  renderModes: z.record(z.array(TemplateEntrySchema).min(1)),
});

export type TemplateEntry = z.infer<typeof TemplateEntrySchema>;
export type TemplateTableData = z.infer<typeof TemplateTableSchema>;

export const RENDER_MODES = ["opaque", "cutout", "transparent"] as const;
export type RenderMode = (typeof RENDER_MODES)[number];

export interface TemplateTables {
  templates: ReadonlyMap<string, { name: string; entries: readonly TemplateEntry[] }>;
  renderModes: ReadonlyMap<string, readonly TemplateEntry[]>;
}

function toRgba(values: number[]): Rgba {
  return [values[0], values[1], values[2], values.length > 3 ? values[3] : 1];
}

function literalWrite(property: string, value: number | number[]): MaterialWrite {
  return typeof value === "number"
    ? { kind: "float", property, value }
    : { kind: "color", property, value: toRgba(value) };
}

export function createTemplateTables(data: TemplateTableData, properties = getPropertyTables()): TemplateTables {
  const templates = new Map<string, { name: string; entries: readonly TemplateEntry[] }>();
  for (const [name, entries] of Object.entries(data.templates)) {
    for (const entry of entries) {
      if (!("slot" in entry)) continue;
      const slot = findScalarSlot(entry.slot, properties);
      if (!slot) {
        throw new Error(`Template "${name}" writes unknown slot "${entry.slot}".`);
      }
      if ((slot.valueKind === "color") !== Array.isArray(entry.value)) {
        throw new Error(`Template "${name}" writes a ${slot.valueKind} slot "${entry.slot}" with the wrong value kind.`);
      }
    }
    templates.set(name.toLowerCase(), { name, entries });
  }
  const renderModes = new Map<string, readonly TemplateEntry[]>();
  for (const [name, entries] of Object.entries(data.renderModes)) {
    if (entries.some((entry) => "slot" in entry)) {
      throw new Error(`Render mode "${name}" must only use literal writes.`);
    }
    renderModes.set(name.toLowerCase(), entries);
  }
  for (const mode of RENDER_MODES) {
    if (!renderModes.has(mode)) {
      throw new Error(`Render mode "${mode}" is missing from the template table.`);
    }
  }
  return { templates, renderModes };
}

let builtinTables: TemplateTables | null = null;

export function getTemplateTables(): TemplateTables {
  if (!builtinTables) {
    builtinTables = createTemplateTables(TemplateTableSchema.parse(templateTable));
  }
  return builtinTables;
}

function resolveEntry(
  entry: TemplateEntry,
  backend: ShadingBackend,
  capabilities: ReadonlySet<string>,
  properties: PropertyTables,
  owner: string,
): MaterialWrite {
  if ("slot" in entry) {
    const property = resolveScalarProperty(entry.slot, backend, capabilities, properties);
    if (!property) {
      throw new BridgeError("UnsupportedSlot", `Template "${owner}" needs slot "${entry.slot}", which the ${backend} shader does not declare.`);
    }
    return literalWrite(property, entry.value);
  }
  if ("property" in entry) {
    return literalWrite(entry.property, entry.value);
  }
  if ("keyword" in entry) {
    return { kind: "keyword", keyword: entry.keyword, enabled: entry.enabled };
  }
  if ("renderQueue" in entry) {
    return { kind: "renderQueue", value: entry.renderQueue };
  }
  return { kind: "globalIllumination", value: entry.globalIllumination };
}

export interface InstantiateOptions {
  /** Property names of the target shader; defaults to the backend's default lit shader. */
  capabilities?: ReadonlySet<string>;
  tables?: TemplateTables;
  properties?: PropertyTables;
}

/**
 * Resolves a named template into concrete writes for a backend, in declared order.
 * Callers apply them in order, so a later write to the same key overrides an earlier one.
 */
export function instantiateTemplate(
  templateName: string,
  backend: ShadingBackend,
  options: InstantiateOptions = {},
): MaterialWrite[] {
  const tables = options.tables ?? getTemplateTables();
  const template = tables.templates.get(templateName.trim().toLowerCase());
  if (!template) {
    throw new BridgeError(
      "UnknownTemplate",
      `Unknown material template: ${templateName}`,
      `Available templates: ${listTemplates(tables).join(", ")}`,
    );
  }
  const properties = options.properties ?? getPropertyTables();
  const catalog = getShaderCatalog();
  const capabilities = options.capabilities ?? catalog.capabilities(catalog.defaultLitShader(backend));
  return template.entries.map((entry) => resolveEntry(entry, backend, capabilities, properties, template.name));
}

export function isRenderMode(value: string): value is RenderMode {
  return RENDER_MODES.some((mode) => mode === value);
}

/** Write sequence for a render mode; anything unrecognised is treated as opaque. */
export function renderModeWrites(mode: string, tables = getTemplateTables()): MaterialWrite[] {
  const key = mode.trim().toLowerCase();
  const entries = tables.renderModes.get(isRenderMode(key) ? key : "opaque") ?? [];
  return entries.map((entry) => resolveEntry(entry, "legacy", new Set(), getPropertyTables(), key));
}

export function listTemplates(tables = getTemplateTables()): string[] {
  return Array.from(tables.templates.values(), (item) => item.name).sort((a, b) => a.localeCompare(b));
}
