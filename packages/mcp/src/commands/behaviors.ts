import { BridgeError, logicalBasename, normalizeAssetPath, param, stripExtension } from "@editor-bridge/core";
import { defineCommand, type CommandContext, type RegisteredCommand } from "../router.js";

const attachParams = {
  targetName: param.required("targetName", "string", "Name of the scene object."),
  behaviorName: param.required("behaviorName", "string", "Behavior type name, with or without the source extension."),
  behaviorPath: param.optional("behaviorPath", "string", "Source path to try before searching by file name."),
};

/** Logical path of the behavior source: the explicit path first, then a search by file name. */
async function locateBehaviorSource(fileName: string, behaviorPath: string | undefined, context: CommandContext) {
  if (behaviorPath) {
    const explicit = normalizeAssetPath(behaviorPath, context.roots);
    if (await context.fs.isFile(explicit.physicalPath)) {
      return explicit.logicalPath;
    }
    context.logger.debug({ behaviorPath: explicit.logicalPath }, "behavior path not found, searching by name");
  }
  const matches = await context.assets.findScripts(fileName);
  return matches.length > 0 ? matches[0] : null;
}

export const attachBehavior = defineCommand({
  name: "attach-behavior",
  description: "Attach a behavior component to a scene object. Attaching one that is already present succeeds.",
  params: Object.values(attachParams),
  decode: (params) => ({
    targetName: attachParams.targetName.read(params),
    behaviorName: attachParams.behaviorName.read(params),
    behaviorPath: attachParams.behaviorPath.read(params),
  }),
  async run(input, context) {
    const target = context.scene.findObject(input.targetName);
    if (!target) {
      throw new BridgeError("NotFound", `Object '${input.targetName}' not found in scene.`);
    }

    const extension = context.textExtension;
    const baseName = logicalBasename(input.behaviorName.replace(/\\/g, "/"));
    const fileName = baseName.toLowerCase().endsWith(extension.toLowerCase()) ? baseName : `${baseName}${extension}`;
    const source = await locateBehaviorSource(fileName, input.behaviorPath, context);
    if (!source) {
      throw new BridgeError("NotFound", `Behavior source '${fileName}' not found in project.`);
    }

    const componentName = stripExtension(logicalBasename(source));
    const factory = context.behaviors.resolve(componentName);
    if (!factory) {
      throw new BridgeError(
        "NotFound",
        `Could not resolve a behavior type for '${componentName}'.`,
        `Registered behavior types: ${context.behaviors.names().join(", ") || "(none)"}`,
      );
    }

    if (target.components.some((component) => component.type === factory.name)) {
      return { componentName, alreadyAttached: true };
    }
    context.scene.addComponent(target.name, factory.create());
    return { componentName, alreadyAttached: false };
  },
});

export const behaviorCommands: RegisteredCommand[] = [attachBehavior];
