import type { BehaviorFactory, BehaviorRegistry } from "./types.js";

export interface BehaviorTypeDeclaration {
  name: string;
  properties: Record<string, unknown>;
}

/**
 * Registry built from an explicit list of behavior types. Names match exactly,
 * the way a compiled type is looked up by its class name.
 */
export function createBehaviorRegistry(declarations: readonly BehaviorTypeDeclaration[] = []): BehaviorRegistry {
  const factories = new Map<string, BehaviorFactory>();
  for (const declaration of declarations) {
    if (factories.has(declaration.name)) {
      throw new Error(`Behavior type "${declaration.name}" is declared twice.`);
    }
    const defaults = { ...declaration.properties };
    factories.set(declaration.name, {
      name: declaration.name,
      create: () => ({ type: declaration.name, properties: { ...defaults } }),
    });
  }

  return {
    resolve: (name) => factories.get(name),
    names: () => Array.from(factories.keys()).sort(),
  };
}
