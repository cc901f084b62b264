import type { RegisteredCommand } from "../router.js";
import { behaviorCommands } from "./behaviors.js";
import { materialCommands } from "./materials.js";
import { createSystemCommands, type SystemCommandOptions } from "./system.js";
import { textAssetCommands } from "./textAssets.js";

export function createEditorCommands(options: SystemCommandOptions): RegisteredCommand[] {
  return [...createSystemCommands(options), ...textAssetCommands, ...behaviorCommands, ...materialCommands];
}
