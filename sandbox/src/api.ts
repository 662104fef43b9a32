/**
 * Ceilings applied to a single invocation.
 */
export interface Limits {
  /** wall-clock budget */
  timeoutMs: number;
  /** CPU time budget */
  cpuMs?: number;
  /**
   * Resident memory ceiling. A process invocation is held to it across its
   * whole process group, under a kernel address-space limit derived from
   * it. A worker invocation caps its V8 heap; `ArrayBuffer` and other
   * external memory of a worker is not bounded.
   */
  memoryMb?: number;
  /**
   * Address space ceiling applied with `ulimit -v`, replacing the one
   * derived from `memoryMb`. It counts reserved rather than resident
   * memory.
   */
  addressSpaceMb?: number;
  /** how often the watchdog samples a running invocation */
  sampleIntervalMs?: number;
}

export interface Metrics {
  durationMs: number;
  cpuMs?: number;
  peakMemoryKb?: number;
}

export type CrashCause =
  /** the implementation could not be started at all */
  | "launch"
  /** non-zero exit */
  | "exit"
  /** killed by a signal */
  | "signal"
  /** output that does not follow the invocation protocol */
  | "protocol"
  /** the implementation reported that it failed */
  | "reported";

export type RawOutcome =
  | {
    type: "success";
    stdout: Uint8Array;
    stderr: string;
    metrics: Metrics;
  }
  | {
    type: "timed-out";
    limitMs: number;
    metrics: Metrics;
  }
  | {
    type: "resource-exceeded";
    resource: "memory" | "cpu";
    limit: number;
    detail: string;
    metrics: Metrics;
  }
  | {
    type: "crashed";
    cause: CrashCause;
    detail: string;
    exitCode?: number;
    signal?: string;
    errorName?: string;
    metrics: Metrics;
  };

export interface ProcessLaunch {
  type: "process";
  command: string;
  arguments: string[];
  cwd?: string;
  /** the complete child environment */
  env?: Record<string, string>;
  /** bytes written to stdin, which is then closed */
  stdin?: Uint8Array;
}

export interface WorkerLaunch {
  type: "worker";
  /** module that calls `workerMain()` */
  entry: URL;
  data: unknown;
}

export type Launch = ProcessLaunch | WorkerLaunch;

export function crashed(
  cause: CrashCause,
  detail: string,
  metrics: Metrics,
  extra: { exitCode?: number; signal?: string; errorName?: string } = {},
): RawOutcome {
  return { type: "crashed", cause, detail, metrics, ...extra };
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
