import { z } from "zod";
import scaffoldTable from "../../data/scaffolds.json" with { type: "json" };

const ScaffoldTableSchema = z.object({
  kinds: z.record(
    z.object({
      aliases: z.array(z.string()),
      imports: z.array(z.string()),
      base: z.string().nullable(),
      body: z.array(z.string()),
    }),
  ),
});

type ScaffoldKind = z.infer<typeof ScaffoldTableSchema>["kinds"][string];

export const DEFAULT_SCAFFOLD_KIND = "behaviour";
const FALLBACK_SCAFFOLD_KIND = "plain";

export const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;

const INDENT = "    ";

let kindsByKey: ReadonlyMap<string, { name: string; kind: ScaffoldKind }> | null = null;

function getKinds() {
  if (!kindsByKey) {
    const table = ScaffoldTableSchema.parse(scaffoldTable);
    const map = new Map<string, { name: string; kind: ScaffoldKind }>();
    for (const [name, kind] of Object.entries(table.kinds)) {
      for (const key of [name, ...kind.aliases]) {
        map.set(key.toLowerCase(), { name, kind });
      }
    }
    if (!map.has(FALLBACK_SCAFFOLD_KIND)) {
      throw new Error(`Scaffold table is missing the "${FALLBACK_SCAFFOLD_KIND}" kind.`);
    }
    kindsByKey = map;
  }
  return kindsByKey;
}

/** Canonical kind name; unrecognised kinds scaffold as "plain". */
export function resolveScaffoldKind(kind: string): string {
  return getKinds().get(kind.trim().toLowerCase())?.name ?? FALLBACK_SCAFFOLD_KIND;
}

export function listScaffoldKinds(): string[] {
  return Array.from(new Set(Array.from(getKinds().values(), (entry) => entry.name))).sort();
}

export function renderScaffold(className: string, kind: string, namespace?: string): string {
  const kinds = getKinds();
  const entry = kinds.get(resolveScaffoldKind(kind).toLowerCase()) ?? kinds.get(FALLBACK_SCAFFOLD_KIND);
  if (!entry) {
    throw new Error(`Scaffold kind "${kind}" is not available.`);
  }
  const { imports, base, body } = entry.kind;

  const lines = [...imports, ""];
  const outer = namespace ? INDENT : "";
  if (namespace) {
    lines.push(`namespace ${namespace}`, "{");
  }
  lines.push(`${outer}public class ${className}${base ? ` : ${base}` : ""}`, `${outer}{`);
  for (const line of body) {
    lines.push(line ? `${outer}${INDENT}${line}` : "");
  }
  lines.push(`${outer}}`);
  if (namespace) {
    lines.push("}");
  }
  return `${lines.join("\n")}\n`;
}
