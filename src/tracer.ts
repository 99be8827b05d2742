/**
 * Recursive radiance estimate along a ray.
 */

import { lerp, mul, unitVector, type Rng, type Vec3 } from "./math";
import type { World } from "./hittable";
import { scatter } from "./material";
import type { Ray } from "./ray";

export const BLACK: Vec3 = [0, 0, 0];
export const SKY_HORIZON: Vec3 = [1, 1, 1];
export const SKY_ZENITH: Vec3 = [0.5, 0.7, 1.0];

/** Lower hit bound; keeps scattered rays from re-hitting their own surface. */
export const T_MIN = 0.001;

export function background(r: Ray): Vec3 {
  const unit = unitVector(r.direction);
  return lerp(SKY_HORIZON, SKY_ZENITH, 0.5 * (unit[1] + 1));
}

export function color(r: Ray, world: World, bounces: number, rng: Rng): Vec3 {
  if (bounces <= 0) return BLACK;

  const found = world.hit(r, T_MIN, Infinity);
  if (!found) return background(r);

  const result = scatter(found.material, r, found.hit, rng);
  if (!result) return BLACK;

  return mul(result.attenuation, color(result.scattered, world, bounces - 1, rng));
}
