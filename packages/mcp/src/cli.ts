#!/usr/bin/env node
import { launchEditorBridge } from "./launch.js";

process.exitCode = await launchEditorBridge(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
});
