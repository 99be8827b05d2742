/**
 * Vector math for the path tracer.
 *
 * Vectors are plain readonly tuples; every helper returns a fresh value.
 */

export type Vec3 = readonly [number, number, number];

/** Uniform random source in [0, 1). */
export type Rng = () => number;

// =============================================================================
// Arithmetic
// =============================================================================

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function negate(v: Vec3): Vec3 {
  return [-v[0], -v[1], -v[2]];
}

/** Component-wise product. */
export function mul(a: Vec3, b: Vec3): Vec3 {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

/** Component-wise quotient. */
export function div(a: Vec3, b: Vec3): Vec3 {
  return [a[0] / b[0], a[1] / b[1], a[2] / b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function divScalar(v: Vec3, s: number): Vec3 {
  return [v[0] / s, v[1] / s, v[2] / s];
}

// =============================================================================
// Products and Norms
// =============================================================================

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function squaredLength(v: Vec3): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2];
}

export function length(v: Vec3): number {
  return Math.sqrt(squaredLength(v));
}

/**
 * Unit vector in the direction of `v`. A zero vector yields NaN components;
 * callers must not normalize one.
 */
export function unitVector(v: Vec3): Vec3 {
  return divScalar(v, length(v));
}

// =============================================================================
// Interpolation
// =============================================================================

export function clamp(x: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, x));
}

export function lerp(from: Vec3, to: Vec3, t: number): Vec3 {
  const k = clamp(t, 0, 1);
  return add(scale(from, 1 - k), scale(to, k));
}

// =============================================================================
// Sampling
// =============================================================================

/**
 * Uniform point strictly inside the unit ball, by rejection from the
 * enclosing cube. Accepts on roughly half of the draws.
 */
export function randomInUnitSphere(rng: Rng): Vec3 {
  for (;;) {
    const p: Vec3 = [2 * rng() - 1, 2 * rng() - 1, 2 * rng() - 1];
    if (squaredLength(p) < 1) return p;
  }
}

/** Mirror `v` about the plane with unit normal `n`. */
export function reflect(v: Vec3, n: Vec3): Vec3 {
  return sub(v, scale(n, 2 * dot(v, n)));
}
