/**
 * Worker thread entry: renders band jobs posted by the pool.
 */

import { parentPort } from "worker_threads";
import { runBandJob } from "./jobs";
import type { WorkerReply, WorkerRequest } from "./pool";

if (!parentPort) {
  throw new Error("render worker must be started from a worker thread");
}

const port = parentPort;

port.on("message", (request: WorkerRequest) => {
  let reply: WorkerReply;
  try {
    reply = { id: request.id, ok: true, result: runBandJob(request.job) };
  } catch (err) {
    const message = err instanceof Error ? err.stack ?? err.message : String(err);
    reply = { id: request.id, ok: false, message };
  }

  port.postMessage(reply);
});
