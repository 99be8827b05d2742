/**
 * Named scene presets. Each module under `src/scenes` registers itself on import.
 */

import type { SceneDescription } from "./types";

export interface ScenePreset {
  name: string;
  description: string;
  build(seed: number): SceneDescription;
}

const presets = new Map<string, ScenePreset>();

export function registerScene(preset: ScenePreset): void {
  if (presets.has(preset.name)) {
    throw new Error(`Scene "${preset.name}" is already registered`);
  }
  presets.set(preset.name, preset);
}

export function getScene(name: string): ScenePreset | undefined {
  return presets.get(name);
}

export function listScenes(): ScenePreset[] {
  return [...presets.values()];
}
