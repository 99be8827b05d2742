/**
 * Analytic spheres and the brute-force world they live in.
 */

import { divScalar, dot, sub, type Vec3 } from "./math";
import type { Material } from "./material";
import { pointAt, type Ray } from "./ray";

export interface Hit {
  t: number;
  position: Vec3;
  /** Unit length, pointing away from the sphere center. */
  normal: Vec3;
}

export interface WorldHit {
  hit: Hit;
  material: Material;
}

// =============================================================================
// Sphere
// =============================================================================

export class Sphere {
  constructor(
    readonly center: Vec3,
    readonly radius: number,
    readonly material: Material
  ) {}

  /**
   * Nearest intersection with t strictly inside (tMin, tMax), or null.
   * Solves a*t^2 + 2b*t + c = 0 with the half-b form.
   */
  hit(r: Ray, tMin: number, tMax: number): Hit | null {
    const oc = sub(r.origin, this.center);
    const a = dot(r.direction, r.direction);
    const b = dot(oc, r.direction);
    const c = dot(oc, oc) - this.radius * this.radius;
    const discriminant = b * b - a * c;
    if (discriminant < 0) return null;

    const root = Math.sqrt(discriminant);
    for (const t of [(-b - root) / a, (-b + root) / a]) {
      if (t > tMin && t < tMax) {
        const position = pointAt(r, t);
        return {
          t,
          position,
          normal: divScalar(sub(position, this.center), this.radius),
        };
      }
    }
    return null;
  }
}

// =============================================================================
// World
// =============================================================================

export class World {
  readonly spheres: readonly Sphere[];

  constructor(spheres: readonly Sphere[] = []) {
    this.spheres = [...spheres];
  }

  get size(): number {
    return this.spheres.length;
  }

  /**
   * Closest hit across all spheres. Each accepted hit shrinks the search
   * interval, so on an exact tie the earlier sphere is kept.
   */
  hit(r: Ray, tMin: number, tMax: number): WorldHit | null {
    let closest: WorldHit | null = null;
    let limit = tMax;

    for (const sphere of this.spheres) {
      const hit = sphere.hit(r, tMin, limit);
      if (hit) {
        closest = { hit, material: sphere.material };
        limit = hit.t;
      }
    }

    return closest;
  }
}
