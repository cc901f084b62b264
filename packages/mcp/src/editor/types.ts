import type { DirectoryMaker, Material, NormalizedAssetPath } from "@editor-bridge/core";

/** Filesystem under the asset root. Paths are physical. */
export interface AssetFileSystem extends DirectoryMaker {
  isFile(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
  /** Recursive listing of files ending in `extension` (case-insensitive). */
  listFiles(directory: string, extension: string): Promise<string[]>;
}

export interface TextureAsset {
  name: string;
  path: string;
}

export interface AssetStore {
  loadMaterial(path: NormalizedAssetPath): Promise<Material | null>;
  /** Creates or overwrites; the parent directory must already exist. */
  saveMaterial(path: NormalizedAssetPath, material: Material): Promise<void>;
  loadTexture(path: NormalizedAssetPath): Promise<TextureAsset | null>;
  /** Logical paths of behavior sources whose file name matches, case-insensitively. */
  findScripts(fileName: string): Promise<string[]>;
}

export interface SceneComponent {
  readonly type: string;
  readonly properties: Readonly<Record<string, unknown>>;
}

export interface MaterialAssignment {
  /** Logical path of a saved material, null for an instance material. */
  readonly path: string | null;
  readonly material: Material;
}

export interface SceneObject {
  readonly name: string;
  readonly components: readonly SceneComponent[];
  /** Null when the object has no renderer. */
  readonly renderer: { readonly material: MaterialAssignment | null } | null;
}

export interface SceneGraph {
  findObject(name: string): SceneObject | undefined;
  addComponent(objectName: string, component: SceneComponent): void;
  assignMaterial(objectName: string, assignment: MaterialAssignment): void;
}

export interface BehaviorFactory {
  readonly name: string;
  create(): SceneComponent;
}

export interface BehaviorRegistry {
  resolve(name: string): BehaviorFactory | undefined;
  names(): string[];
}
