/**
 * Shared utilities for the scene system.
 */

import { createNoise2D } from "simplex-noise";
import { Camera } from "../camera";
import { Sphere, World } from "../hittable";
import type { Rng } from "../math";
import type { SceneDescription } from "./types";

// =============================================================================
// Random
// =============================================================================

/** 31-bit LCG; uniform in [0, 1). */
export function seededRandom(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

/** Seed for the `index`-th independent stream derived from `seed`. */
export function deriveSeed(seed: number, index: number): number {
  return (Math.imul(seed ^ 0x5bd1e995, 0x9e3779b1) + Math.imul(index + 1, 0x85ebca6b)) >>> 0;
}

// =============================================================================
// Noise
// =============================================================================

export function createNoiseGenerator(rng: Rng) {
  const noise2D = createNoise2D(rng);

  return function pnoise1(x: number, octaves: number = 1): number {
    let value = 0;
    let amplitude = 1;
    let frequency = 1;
    let maxValue = 0;

    for (let i = 0; i < octaves; i++) {
      value += noise2D(x * frequency, 0) * amplitude;
      maxValue += amplitude;
      amplitude *= 0.5;
      frequency *= 2;
    }

    return value / maxValue;
  };
}

// =============================================================================
// Scene Compilation
// =============================================================================

export function buildWorld(scene: SceneDescription): World {
  return new World(scene.spheres.map((s) => new Sphere(s.center, s.radius, s.material)));
}

export function buildCamera(scene: SceneDescription, aspect: number): Camera {
  return new Camera({ ...scene.camera, aspect });
}
