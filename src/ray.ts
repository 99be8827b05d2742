import { add, scale, type Vec3 } from "./math";

export interface Ray {
  readonly origin: Vec3;
  /** Not necessarily unit length. */
  readonly direction: Vec3;
}

export function ray(origin: Vec3, direction: Vec3): Ray {
  return { origin, direction };
}

export function pointAt(r: Ray, t: number): Vec3 {
  return add(r.origin, scale(r.direction, t));
}
