/**
 * Surface materials and their scattering response.
 */

import {
  add,
  clamp,
  dot,
  randomInUnitSphere,
  reflect,
  scale,
  sub,
  unitVector,
  type Rng,
  type Vec3,
} from "./math";
import { ray, type Ray } from "./ray";
import type { Hit } from "./hittable";

// =============================================================================
// Material Types
// =============================================================================

export interface DiffuseMaterial {
  type: "diffuse";
  albedo: Vec3;
}

export interface MetalMaterial {
  type: "metal";
  albedo: Vec3;
  /** Roughness, clamped to [0, 1] when scattering. */
  fuzz: number;
}

export type Material = DiffuseMaterial | MetalMaterial;

export interface Scatter {
  attenuation: Vec3;
  scattered: Ray;
}

export const materials = {
  diffuse: (albedo: Vec3): DiffuseMaterial => ({ type: "diffuse", albedo }),
  metal: (albedo: Vec3, fuzz: number = 0): MetalMaterial => ({
    type: "metal",
    albedo,
    fuzz,
  }),
};

// =============================================================================
// Scattering
// =============================================================================

/**
 * Returns the attenuation and outgoing ray, or null when the material
 * absorbs the incoming ray.
 */
export function scatter(
  material: Material,
  incoming: Ray,
  hit: Hit,
  rng: Rng
): Scatter | null {
  switch (material.type) {
    case "diffuse": {
      // Offset unit-sphere target, not a cosine-weighted hemisphere sample.
      const target = add(add(hit.position, hit.normal), randomInUnitSphere(rng));
      return {
        attenuation: material.albedo,
        scattered: ray(hit.position, sub(target, hit.position)),
      };
    }
    case "metal": {
      const reflected = reflect(unitVector(incoming.direction), hit.normal);
      const fuzz = clamp(material.fuzz, 0, 1);
      const direction = add(reflected, scale(randomInUnitSphere(rng), fuzz));
      if (dot(direction, hit.normal) <= 0) return null;
      return {
        attenuation: material.albedo,
        scattered: ray(hit.position, direction),
      };
    }
  }
}
