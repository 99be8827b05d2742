/**
 * Per-pixel sampling, tone mapping and packing into a framebuffer.
 */

import type { Bitmap } from "./bitmap";
import type { Camera } from "./camera";
import type { World } from "./hittable";
import { add, clamp, divScalar, type Rng, type Vec3 } from "./math";
import { color } from "./tracer";

export interface FrameOptions {
  world: World;
  camera: Camera;
  /** Anti-aliasing samples per pixel. */
  samples: number;
  /** Bounce budget handed to the integrator. */
  maxDepth: number;
  rng: Rng;
  /** Sub-pixel offset source in [0, 1); defaults to `rng`. */
  jitter?: Rng;
}

/** Image size plus the range of storage rows (top-down) a band covers. */
export interface Band {
  width: number;
  height: number;
  rowStart: number;
  rowEnd: number;
}

const ALPHA_MASK = 0xff000000;

// =============================================================================
// Pixel Pipeline
// =============================================================================

/** Mean linear radiance over `samples` jittered rays through pixel (x, y). */
export function samplePixel(
  x: number,
  y: number,
  width: number,
  height: number,
  opts: FrameOptions
): Vec3 {
  const jitter = opts.jitter ?? opts.rng;
  let sum: Vec3 = [0, 0, 0];

  for (let i = 0; i < opts.samples; i++) {
    const s = (x + jitter()) / width;
    const t = (y + jitter()) / height;
    sum = add(sum, color(opts.camera.ray(s, t), opts.world, opts.maxDepth, opts.rng));
  }

  return divScalar(sum, opts.samples);
}

/** Gamma 2 then truncation to 8 bits per channel. */
export function toDisplay(c: Vec3): [number, number, number] {
  return [quantize(c[0]), quantize(c[1]), quantize(c[2])];
}

function quantize(channel: number): number {
  return clamp(Math.trunc(Math.sqrt(Math.max(channel, 0)) * 255), 0, 255);
}

/** Packs RGB into `existing`, keeping its top byte. */
export function packColor(existing: number, rgb: readonly [number, number, number]): number {
  return ((existing & ALPHA_MASK) | (rgb[0] << 16) | (rgb[1] << 8) | rgb[2]) >>> 0;
}

export function unpackColor(packed: number): [number, number, number] {
  return [(packed >>> 16) & 0xff, (packed >>> 8) & 0xff, packed & 0xff];
}

// =============================================================================
// Bands and Frames
// =============================================================================

/**
 * Renders the storage rows [rowStart, rowEnd) into `pixels`, which holds
 * exactly those rows. Existing alpha bytes in `pixels` survive.
 */
export function renderBand(pixels: Uint32Array, band: Band, opts: FrameOptions): void {
  const { width, height, rowStart, rowEnd } = band;

  for (let row = rowStart; row < rowEnd; row++) {
    const y = height - row - 1;
    const offset = (row - rowStart) * width;
    for (let x = 0; x < width; x++) {
      const linear = samplePixel(x, y, width, height, opts);
      pixels[offset + x] = packColor(pixels[offset + x] ?? 0, toDisplay(linear));
    }
  }
}

/** Single-threaded render of the whole bitmap. */
export function renderFrame(bitmap: Bitmap, opts: FrameOptions): void {
  renderBand(
    bitmap.buffer,
    { width: bitmap.width, height: bitmap.height, rowStart: 0, rowEnd: bitmap.height },
    opts
  );
}
