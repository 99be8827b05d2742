/**
 * Render settings and the checks applied before anything reaches the core.
 */

import { availableParallelism } from "os";
import { cross, length, squaredLength, sub } from "./math";
import type { CameraDef } from "./scene";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface RenderConfig {
  width: number;
  height: number;
  /** Anti-aliasing samples per pixel. */
  samples: number;
  maxDepth: number;
  /** Worker threads; 1 renders on the calling thread. */
  workers: number;
  seed: number;
}

export const DEFAULT_RENDER_CONFIG: Omit<RenderConfig, "workers"> = {
  width: 200,
  height: 100,
  samples: 100,
  maxDepth: 50,
  seed: 1,
};

function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveRenderConfig(cfg: Partial<RenderConfig> = {}): RenderConfig {
  const seed = cfg.seed ?? DEFAULT_RENDER_CONFIG.seed;
  if (!Number.isInteger(seed)) {
    throw new ConfigError(`seed must be an integer, got ${seed}`);
  }

  return {
    width: requirePositiveInteger(cfg.width ?? DEFAULT_RENDER_CONFIG.width, "width"),
    height: requirePositiveInteger(cfg.height ?? DEFAULT_RENDER_CONFIG.height, "height"),
    samples: requirePositiveInteger(cfg.samples ?? DEFAULT_RENDER_CONFIG.samples, "samples"),
    maxDepth: requirePositiveInteger(cfg.maxDepth ?? DEFAULT_RENDER_CONFIG.maxDepth, "maxDepth"),
    workers: requirePositiveInteger(cfg.workers ?? availableParallelism(), "workers"),
    seed,
  };
}

/**
 * Rejects camera setups whose basis cannot be built: eye on the look-at
 * point, or up parallel to the view direction.
 */
export function validateCamera(camera: CameraDef): void {
  const view = sub(camera.eye, camera.at);
  if (squaredLength(view) === 0) {
    throw new ConfigError("camera.eye and camera.at must differ");
  }
  if (squaredLength(camera.up) === 0) {
    throw new ConfigError("camera.up must be non-zero");
  }
  const sine = length(cross(camera.up, view)) / (length(camera.up) * length(view));
  if (sine < 1e-6) {
    throw new ConfigError("camera.up must not be parallel to the view direction");
  }
  if (!(camera.fov > 0 && camera.fov < 180)) {
    throw new ConfigError(`camera.fov must be within (0, 180) degrees, got ${camera.fov}`);
  }
}
