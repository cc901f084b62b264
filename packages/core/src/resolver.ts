import { z } from "zod";
import slotTable from "../data/slots.json" with { type: "json" };
import type { ShadingBackend } from "./shading.js";

const CandidateListSchema = z.array(z.string().min(1)).min(1);

const CandidatesSchema = z.object({
  default: CandidateListSchema,
  legacy: CandidateListSchema.optional(),
  universal: CandidateListSchema.optional(),
  highDefinition: CandidateListSchema.optional(),
});

export const SlotTableSchema = z.object({
  aliases: z.record(z.string().min(1)),
  texture: z.record(CandidatesSchema),
  scalar: z.record(
    z.object({
      valueKind: z.enum(["float", "color"]),
      candidates: CandidatesSchema,
    }),
  ),
});

export type SlotTableData = z.infer<typeof SlotTableSchema>;

export type ScalarValueKind = "float" | "color";

export interface SlotDescriptor {
  name: string;
  candidates: Readonly<Record<ShadingBackend, readonly string[]>>;
}

export interface ScalarSlotDescriptor extends SlotDescriptor {
  valueKind: ScalarValueKind;
}

export interface PropertyTables {
  texture: ReadonlyMap<string, SlotDescriptor>;
  scalar: ReadonlyMap<string, ScalarSlotDescriptor>;
  aliases: ReadonlyMap<string, string>;
}

function expandCandidates(candidates: z.infer<typeof CandidatesSchema>): Record<ShadingBackend, readonly string[]> {
  return {
    legacy: candidates.legacy ?? candidates.default,
    universal: candidates.universal ?? candidates.default,
    highDefinition: candidates.highDefinition ?? candidates.default,
  };
}

export function createPropertyTables(data: SlotTableData): PropertyTables {
  const texture = new Map<string, SlotDescriptor>();
  for (const [name, candidates] of Object.entries(data.texture)) {
    texture.set(name.toLowerCase(), { name, candidates: expandCandidates(candidates) });
  }
  const scalar = new Map<string, ScalarSlotDescriptor>();
  for (const [name, entry] of Object.entries(data.scalar)) {
    scalar.set(name.toLowerCase(), {
      name,
      valueKind: entry.valueKind,
      candidates: expandCandidates(entry.candidates),
    });
  }
  const aliases = new Map<string, string>();
  for (const [alias, target] of Object.entries(data.aliases)) {
    if (!texture.has(target.toLowerCase())) {
      throw new Error(`Slot alias "${alias}" points at unknown texture slot "${target}".`);
    }
    aliases.set(alias.toLowerCase(), target.toLowerCase());
  }
  return { texture, scalar, aliases };
}

let builtinTables: PropertyTables | null = null;

export function getPropertyTables(): PropertyTables {
  if (!builtinTables) {
    builtinTables = createPropertyTables(SlotTableSchema.parse(slotTable));
  }
  return builtinTables;
}

function firstPresent(candidates: readonly string[], capabilities: ReadonlySet<string>): string | null {
  return candidates.find((candidate) => capabilities.has(candidate)) ?? null;
}

export function findTextureSlot(slot: string, tables = getPropertyTables()): SlotDescriptor | null {
  const key = slot.trim().toLowerCase();
  return tables.texture.get(tables.aliases.get(key) ?? key) ?? null;
}

export function findScalarSlot(slot: string, tables = getPropertyTables()): ScalarSlotDescriptor | null {
  return tables.scalar.get(slot.trim().toLowerCase()) ?? null;
}

/**
 * Concrete texture property for an abstract slot: the first candidate of the
 * backend's ordered list that the material declares, or null.
 */
export function resolveProperty(
  slot: string,
  backend: ShadingBackend,
  capabilities: ReadonlySet<string>,
  tables = getPropertyTables(),
): string | null {
  const descriptor = findTextureSlot(slot, tables);
  return descriptor ? firstPresent(descriptor.candidates[backend], capabilities) : null;
}

export function resolveScalarProperty(
  slot: string,
  backend: ShadingBackend,
  capabilities: ReadonlySet<string>,
  tables = getPropertyTables(),
): string | null {
  const descriptor = findScalarSlot(slot, tables);
  return descriptor ? firstPresent(descriptor.candidates[backend], capabilities) : null;
}

export function listTextureSlots(tables = getPropertyTables()): string[] {
  return Array.from(tables.texture.values(), (item) => item.name).sort((a, b) => a.localeCompare(b));
}

export function listScalarSlots(tables = getPropertyTables()): string[] {
  return Array.from(tables.scalar.values(), (item) => item.name).sort((a, b) => a.localeCompare(b));
}
