/**
 * Fan-out of band jobs over worker threads.
 *
 * Every band is owned by exactly one job; the main thread copies finished
 * bands back into the bitmap, so no two threads ever write the same pixels.
 */

import { Worker } from "worker_threads";
import type { Bitmap } from "../bitmap";
import type { RenderConfig } from "../config";
import { createLogger } from "../log";
import type { SceneDescription } from "../scene/types";
import { inlineExecutor, splitRows, type BandExecutor, type BandJob, type BandResult } from "./jobs";

const log = createLogger("render");

export interface WorkerRequest {
  id: number;
  job: BandJob;
}

export type WorkerReply =
  | { id: number; ok: true; result: BandResult }
  | { id: number; ok: false; message: string };

export interface RenderStats {
  bands: number;
  workers: number;
  elapsedMs: number;
}

// =============================================================================
// Worker Pool
// =============================================================================

interface Pending {
  request: WorkerRequest;
  resolve: (result: BandResult) => void;
  reject: (err: Error) => void;
}

interface Slot {
  worker: Worker;
  current: Pending | null;
}

const WORKER_ENTRY = new URL("./worker-entry.mjs", import.meta.url);
const WORKER_MODULE = new URL("./worker.ts", import.meta.url).href;

export class WorkerPool {
  private slots: Slot[] = [];
  private queue: Pending[] = [];
  private nextId = 0;
  private closed = false;

  constructor(readonly size: number) {
    for (let i = 0; i < size; i++) {
      this.slots.push(this.spawn());
    }
  }

  private spawn(): Slot {
    const worker = new Worker(WORKER_ENTRY, { workerData: { entry: WORKER_MODULE } });
    const slot: Slot = { worker, current: null };

    slot.worker.on("message", (reply: WorkerReply) => {
      const pending = slot.current;
      slot.current = null;
      if (pending && pending.request.id === reply.id) {
        if (reply.ok) {
          pending.resolve(reply.result);
        } else {
          pending.reject(new Error(`band ${pending.request.job.index} failed: ${reply.message}`));
        }
      }
      this.drain();
    });

    slot.worker.on("error", (err) => {
      const pending = slot.current;
      slot.current = null;
      pending?.reject(err);
      this.replace(slot);
    });

    return slot;
  }

  private replace(dead: Slot): void {
    const index = this.slots.indexOf(dead);
    if (index === -1) return;
    if (this.closed) {
      this.slots.splice(index, 1);
      return;
    }
    this.slots[index] = this.spawn();
    this.drain();
  }

  private drain(): void {
    for (const slot of this.slots) {
      if (slot.current) continue;
      const next = this.queue.shift();
      if (!next) return;
      slot.current = next;
      slot.worker.postMessage(next.request);
    }
  }

  execute: BandExecutor = (job) => {
    if (this.closed) {
      return Promise.reject(new Error("worker pool is closed"));
    }
    return new Promise<BandResult>((resolve, reject) => {
      this.queue.push({
        request: { id: this.nextId++, job },
        resolve,
        reject,
      });
      this.drain();
    });
  };

  async close(): Promise<void> {
    this.closed = true;
    const pending = this.queue.splice(0);
    for (const slot of this.slots) {
      if (slot.current) pending.push(slot.current);
      slot.current = null;
    }
    for (const p of pending) p.reject(new Error("worker pool is closed"));
    await Promise.all(this.slots.map((slot) => slot.worker.terminate()));
    this.slots = [];
  }
}

// =============================================================================
// Frame Driver
// =============================================================================

/**
 * Renders every band through `executor` and assembles the frame. Existing
 * alpha bytes in `bitmap` are carried through each band.
 */
export async function renderBands(
  bitmap: Bitmap,
  scene: SceneDescription,
  cfg: Pick<RenderConfig, "samples" | "maxDepth" | "seed">,
  executor: BandExecutor
): Promise<number> {
  const rows = splitRows(bitmap.height);

  const results = await Promise.all(
    rows.map(([rowStart, rowEnd], index) =>
      executor({
        index,
        scene,
        band: { width: bitmap.width, height: bitmap.height, rowStart, rowEnd },
        samples: cfg.samples,
        maxDepth: cfg.maxDepth,
        seed: cfg.seed,
        pixels: bitmap.readRows(rowStart, rowEnd),
      })
    )
  );

  for (const result of results) {
    bitmap.writeRows(result.rowStart, result.pixels);
    log.debug(`band ${result.index} rows ${result.rowStart}-${result.rowEnd} in ${result.elapsedMs.toFixed(1)}ms`);
  }

  return rows.length;
}

/** Full render; one worker renders inline without spawning threads. */
export async function renderParallel(
  bitmap: Bitmap,
  scene: SceneDescription,
  cfg: RenderConfig
): Promise<RenderStats> {
  const started = performance.now();
  const workers = Math.min(cfg.workers, splitRows(bitmap.height).length);
  log.info(
    `rendering "${scene.name}" ${bitmap.width}x${bitmap.height}, ${cfg.samples} samples, depth ${cfg.maxDepth}, ${workers} worker(s)`
  );

  let bands: number;
  if (workers <= 1) {
    bands = await renderBands(bitmap, scene, cfg, inlineExecutor);
  } else {
    const pool = new WorkerPool(workers);
    try {
      bands = await renderBands(bitmap, scene, cfg, pool.execute);
    } finally {
      await pool.close();
    }
  }

  const elapsedMs = performance.now() - started;
  log.info(`rendered ${bands} bands in ${(elapsedMs / 1000).toFixed(2)}s`);
  return { bands, workers, elapsedMs };
}
