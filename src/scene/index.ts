/**
 * Scene utilities - types, compilation, loading and presets.
 */

export * from "./types";
export { buildWorld, buildCamera, seededRandom, deriveSeed } from "./utils";
export { registerScene, getScene, listScenes, type ScenePreset } from "./registry";
export { parseScene, loadSceneFile, SceneError } from "./load";
