/**
 * Pinhole camera mapping normalized image coordinates to world-space rays.
 */

import { add, cross, scale, sub, unitVector, type Vec3 } from "./math";
import { ray, type Ray } from "./ray";

export interface CameraConfig {
  eye?: Vec3;
  at?: Vec3;
  up?: Vec3;
  /** Vertical field of view in degrees. */
  fov?: number;
  /** Width over height. */
  aspect?: number;
}

export class Camera {
  readonly origin: Vec3;
  readonly lowerLeftCorner: Vec3;
  readonly horizontal: Vec3;
  readonly vertical: Vec3;

  constructor(cfg: CameraConfig = {}) {
    const eye = cfg.eye ?? [0, 0, 0];
    const at = cfg.at ?? [0, 0, -1];
    const up = cfg.up ?? [0, 1, 0];
    const fov = cfg.fov ?? 90;
    const aspect = cfg.aspect ?? 2;

    const w = unitVector(sub(eye, at));
    const u = unitVector(cross(up, w));
    const v = cross(w, u);

    const fovRad = (fov * Math.PI) / 180;
    const halfHeight = Math.tan(fovRad / 2);
    const halfWidth = aspect * halfHeight;

    this.origin = eye;
    this.lowerLeftCorner = sub(
      sub(sub(eye, scale(u, halfWidth)), scale(v, halfHeight)),
      w
    );
    this.horizontal = scale(u, 2 * halfWidth);
    this.vertical = scale(v, 2 * halfHeight);
  }

  /** `s` runs left to right, `t` bottom to top, both over [0, 1]. */
  ray(s: number, t: number): Ray {
    const target = add(
      add(this.lowerLeftCorner, scale(this.horizontal, s)),
      scale(this.vertical, t)
    );
    return ray(this.origin, sub(target, this.origin));
  }
}
