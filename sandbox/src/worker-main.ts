import { getHeapStatistics } from "node:v8";
import { isMainThread, parentPort, workerData } from "node:worker_threads";
import { type Operation, run } from "effection";
import { serializeError, type WorkerResult } from "./messages.ts";

function heapUsedKb(): number {
  return Math.round(getHeapStatistics().used_heap_size / 1024);
}

/**
 * Entrypoint of a sandboxed worker. Runs `body` with the launch data and
 * posts exactly one result message back to the sandbox.
 *
 * @example
 * ```ts
 * import { workerMain } from "@swhid-conformance/sandbox/worker-main";
 *
 * await workerMain(function* (data) {
 *   return `received ${JSON.stringify(data)}`;
 * });
 * ```
 */
export async function workerMain<TReturn>(
  body: (data: unknown) => Operation<TReturn>,
): Promise<void> {
  let port = parentPort;
  if (isMainThread || !port) {
    throw new Error("workerMain() must be called from inside a worker thread");
  }
  let data: unknown = workerData;

  let result: WorkerResult;
  try {
    let value = await run(() => body(data));
    result = { ok: true, value, heapUsedKb: heapUsedKb() };
  } catch (error) {
    result = { ok: false, error: serializeError(error), heapUsedKb: heapUsedKb() };
  }

  try {
    port.postMessage(result);
  } catch (error) {
    // the value could not be cloned across the thread boundary
    port.postMessage({
      ok: false,
      error: serializeError(error),
      heapUsedKb: heapUsedKb(),
    } satisfies WorkerResult);
  }
}
