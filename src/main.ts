#!/usr/bin/env tsx
/**
 * sphere-tracer - path traces a sphere scene, then shows it in the terminal.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { Bitmap } from "./bitmap";
import { resolveRenderConfig, validateCamera } from "./config";
import { LOG_LEVELS, createLogger, parseLogLevel, setLogLevel } from "./log";
import { renderParallel } from "./parallel/pool";
import { present } from "./present/terminal";
import { getScene, listScenes, loadSceneFile, type SceneDescription } from "./scene";
import "./scenes";

const log = createLogger("main");

// =============================================================================
// Arguments
// =============================================================================

function parseArgs(argv: string[]) {
  return yargs(argv)
    .scriptName("sphere-tracer")
    .usage("$0 [options]")
    .option("width", { alias: "w", type: "number", description: "Image width in pixels" })
    .option("height", { alias: "h", type: "number", description: "Image height in pixels" })
    .option("samples", { alias: "s", type: "number", description: "Anti-aliasing samples per pixel" })
    .option("depth", { alias: "d", type: "number", description: "Maximum bounces per path" })
    .option("workers", { alias: "j", type: "number", description: "Worker threads (default: CPU count)" })
    .option("seed", { type: "number", description: "Random seed" })
    .option("scene", { type: "string", description: "Scene JSON file" })
    .option("preset", {
      alias: "p",
      type: "string",
      description: "Built-in scene, used when --scene is absent",
      default: "default",
      choices: listScenes().map((s) => s.name),
    })
    .option("view", {
      type: "boolean",
      description: "Show the result in the terminal (--no-view to skip)",
      default: true,
    })
    .option("log-level", {
      type: "string",
      description: "silent, error, warn, info or debug",
      choices: [...LOG_LEVELS],
    })
    .help("help")
    .strict()
    .parseSync();
}

function selectScene(scenePath: string | undefined, preset: string, seed: number): SceneDescription {
  if (scenePath) return loadSceneFile(scenePath);

  const found = getScene(preset);
  if (!found) {
    throw new Error(`Unknown preset "${preset}"`);
  }
  return found.build(seed);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const args = parseArgs(hideBin(process.argv));

  const level = parseLogLevel(args["log-level"]);
  if (level) setLogLevel(level);

  const config = resolveRenderConfig({
    width: args.width,
    height: args.height,
    samples: args.samples,
    maxDepth: args.depth,
    workers: args.workers,
    seed: args.seed,
  });

  const scene = selectScene(args.scene, args.preset, config.seed);
  validateCamera(scene.camera);
  log.debug(`scene "${scene.name}" with ${scene.spheres.length} sphere(s)`);

  const bitmap = new Bitmap(config.width, config.height);
  await renderParallel(bitmap, scene, config);

  if (!args.view) return;
  if (!process.stdout.isTTY || !process.stdin.isTTY) {
    log.warn("not a terminal, skipping the viewer");
    return;
  }
  await present(bitmap);
}

main().catch((err) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
