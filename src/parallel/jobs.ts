/**
 * Band jobs: the unit of work handed to a render worker.
 */

import { renderBand, type Band } from "../render";
import { buildCamera, buildWorld, deriveSeed, seededRandom } from "../scene/utils";
import type { SceneDescription } from "../scene/types";

export interface BandJob {
  index: number;
  scene: SceneDescription;
  band: Band;
  samples: number;
  maxDepth: number;
  /** Frame seed; the band's own stream is derived from it and `index`. */
  seed: number;
  /** Current contents of the band's rows; rendered in place. */
  pixels: Uint32Array;
}

export interface BandResult {
  index: number;
  rowStart: number;
  rowEnd: number;
  pixels: Uint32Array;
  elapsedMs: number;
}

export type BandExecutor = (job: BandJob) => Promise<BandResult>;

/** Rows per band; fixed so output does not depend on the worker count. */
export const ROWS_PER_BAND = 8;

export function splitRows(height: number, rowsPerBand: number = ROWS_PER_BAND): Array<[number, number]> {
  const bands: Array<[number, number]> = [];
  for (let start = 0; start < height; start += rowsPerBand) {
    bands.push([start, Math.min(height, start + rowsPerBand)]);
  }
  return bands;
}

/** Renders one band on the calling thread. */
export function runBandJob(job: BandJob): BandResult {
  const started = performance.now();
  const { band } = job;

  renderBand(job.pixels, band, {
    world: buildWorld(job.scene),
    camera: buildCamera(job.scene, band.width / band.height),
    samples: job.samples,
    maxDepth: job.maxDepth,
    rng: seededRandom(deriveSeed(job.seed, job.index)),
  });

  return {
    index: job.index,
    rowStart: band.rowStart,
    rowEnd: band.rowEnd,
    pixels: job.pixels,
    elapsedMs: performance.now() - started,
  };
}

export const inlineExecutor: BandExecutor = async (job) => runBandJob(job);
