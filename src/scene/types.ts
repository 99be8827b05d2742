/**
 * Plain-data scene description: what a scene file or preset produces and
 * what render workers receive.
 */

import type { Vec3 } from "../math";
import type { Material } from "../material";

// =============================================================================
// Scene Data Types
// =============================================================================

export interface SphereDef {
  center: Vec3;
  radius: number;
  material: Material;
}

export interface CameraDef {
  eye: Vec3;
  at: Vec3;
  up: Vec3;
  fov: number;          // vertical, degrees
}

export interface SceneDescription {
  name: string;
  camera: CameraDef;
  spheres: SphereDef[];  // scan order decides exact-tie hits
}

export const DEFAULT_CAMERA: CameraDef = {
  eye: [0, 0, 0],
  at: [0, 0, -1],
  up: [0, 1, 0],
  fov: 90,
};
