import { type ChildProcess, spawn as spawnProcess } from "node:child_process";
import { Buffer } from "node:buffer";
import process from "node:process";
import {
  call,
  type Operation,
  race,
  sleep,
  withResolvers,
} from "effection";
import {
  crashed,
  errnoCode,
  type Limits,
  type Metrics,
  type ProcessLaunch,
  type RawOutcome,
} from "./api.ts";
import { sampleGroup } from "./proc.ts";

const SAMPLE_INTERVAL_MS = 20;
const KILL_GRACE_MS = 2000;
// address space a runtime reserves without touching it: V8 code range,
// thread stacks, allocator arenas
const ADDRESS_SPACE_RESERVE_MB = 4096;
const MEMORY_EXHAUSTION =
  /out of memory|cannot allocate memory|MemoryError|std::bad_alloc|memory allocation of \d+ bytes failed|array buffer allocation failed/i;

type Termination =
  | { type: "error"; error: Error }
  | { type: "close"; code: number | null; signal: NodeJS.Signals | null };

const isWin32 = () => process.platform === "win32";

interface Command {
  command: string;
  arguments: string[];
  wrapped: boolean;
}

/**
 * Kernel address-space ceiling in megabytes: `addressSpaceMb` when set,
 * otherwise the memory ceiling plus room for reserved but untouched
 * address space.
 */
export function addressSpaceOf(limits: Limits): number | undefined {
  if (limits.addressSpaceMb !== undefined) {
    return limits.addressSpaceMb;
  }
  if (limits.memoryMb !== undefined) {
    return limits.memoryMb + ADDRESS_SPACE_RESERVE_MB;
  }
  return undefined;
}

/**
 * Put kernel limits on the child with the shell's `ulimit` before it
 * `exec`s the real command, so the limits hold for the implementation
 * itself and everything it starts.
 */
export function withRlimits(launch: ProcessLaunch, limits: Limits): Command {
  let settings: string[] = [];
  if (limits.cpuMs !== undefined) {
    settings.push(`ulimit -t ${Math.max(1, Math.ceil(limits.cpuMs / 1000))}`);
  }
  let addressSpaceMb = addressSpaceOf(limits);
  if (addressSpaceMb !== undefined) {
    settings.push(`ulimit -v ${addressSpaceMb * 1024}`);
  }
  if (settings.length === 0 || isWin32()) {
    return { command: launch.command, arguments: launch.arguments, wrapped: false };
  }
  return {
    command: "/bin/sh",
    arguments: [
      "-c",
      `${settings.join("; ")}; exec "$0" "$@"`,
      launch.command,
      ...launch.arguments,
    ],
    wrapped: true,
  };
}

// The child runs detached in its own process group. Signalling `-pid`
// reaches every process the implementation started, not just the first.
function killGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    if (isWin32()) {
      child.kill("SIGKILL");
    } else {
      process.kill(-child.pid, "SIGKILL");
    }
  } catch (error) {
    if (errnoCode(error) !== "ESRCH") {
      throw error;
    }
  }
}

/**
 * Run one external process to completion, or until it breaks one of its
 * limits. Every way it can end is returned as a `RawOutcome`.
 */
export function runProcess(
  launch: ProcessLaunch,
  limits: Limits,
): Operation<RawOutcome> {
  return call(function* () {
    let started = performance.now();
    let usage: { cpuMs?: number; peakMemoryKb?: number } = {};
    let metrics = (): Metrics => ({
      durationMs: Math.round(performance.now() - started),
      ...usage,
    });

    let command = withRlimits(launch, limits);
    let child = spawnProcess(command.command, command.arguments, {
      detached: !isWin32(),
      cwd: launch.cwd,
      env: launch.env,
      stdio: "pipe",
      windowsHide: true,
    });

    let stdout: Buffer[] = [];
    let stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    let termination = withResolvers<Termination>();
    let terminated = false;
    let settle = (value: Termination) => {
      if (!terminated) {
        terminated = true;
        termination.resolve(value);
      }
    };
    child.once("error", (error) => settle({ type: "error", error }));
    child.once("close", (code, signal) => settle({ type: "close", code, signal }));

    // an implementation that exits without reading its input closes the
    // pipe under us; that is its choice, and the exit status tells the rest
    let stdinError: Error | undefined;
    child.stdin.on("error", (error) => {
      stdinError = error;
    });
    child.stdin.end(launch.stdin ? Buffer.from(launch.stdin) : undefined);

    function* completion(): Operation<RawOutcome> {
      let ended = yield* termination.operation;
      let diagnostic = Buffer.concat(stderr).toString("utf8");
      if (ended.type === "error") {
        return crashed("launch", ended.error.message, metrics(), {
          errorName: errnoCode(ended.error),
        });
      }
      let { code, signal } = ended;
      let status = {
        exitCode: code ?? undefined,
        signal: signal ?? undefined,
      };
      if (command.wrapped && (code === 126 || code === 127)) {
        return crashed("launch", diagnostic, metrics(), status);
      }
      if (
        signal === "SIGXCPU" ||
        (signal === "SIGKILL" && limits.cpuMs !== undefined &&
          (usage.cpuMs ?? 0) >= limits.cpuMs)
      ) {
        return {
          type: "resource-exceeded",
          resource: "cpu",
          limit: limits.cpuMs ?? 0,
          detail: `killed by ${signal}`,
          metrics: metrics(),
        };
      }
      if (code !== 0 && MEMORY_EXHAUSTION.test(diagnostic)) {
        return {
          type: "resource-exceeded",
          resource: "memory",
          limit: limits.memoryMb ?? addressSpaceOf(limits) ?? 0,
          detail: diagnostic,
          metrics: metrics(),
        };
      }
      if (signal) {
        return crashed("signal", diagnostic, metrics(), status);
      }
      if (code !== 0) {
        let detail = stdinError
          ? `${diagnostic}\n(stdin: ${stdinError.message})`.trim()
          : diagnostic;
        return crashed("exit", detail, metrics(), status);
      }
      return {
        type: "success",
        stdout: new Uint8Array(Buffer.concat(stdout)),
        stderr: diagnostic,
        metrics: metrics(),
      };
    }

    function* deadline(): Operation<RawOutcome> {
      yield* sleep(limits.timeoutMs);
      return { type: "timed-out", limitMs: limits.timeoutMs, metrics: metrics() };
    }

    // samples the whole process group, so memory handed to a helper the
    // implementation started counts against the same ceiling
    function* watchdog(): Operation<RawOutcome> {
      let interval = limits.sampleIntervalMs ?? SAMPLE_INTERVAL_MS;
      while (true) {
        let sample = child.pid !== undefined && !terminated
          ? yield* sampleGroup(child.pid)
          : undefined;
        if (sample) {
          usage.cpuMs = Math.max(usage.cpuMs ?? 0, sample.cpuMs);
          usage.peakMemoryKb = Math.max(usage.peakMemoryKb ?? 0, sample.peakRssKb);
          if (
            limits.memoryMb !== undefined && sample.rssKb > limits.memoryMb * 1024
          ) {
            return {
              type: "resource-exceeded",
              resource: "memory",
              limit: limits.memoryMb,
              detail: `resident memory ${sample.rssKb}kB over ${limits.memoryMb}MB`,
              metrics: metrics(),
            };
          }
          if (limits.cpuMs !== undefined && sample.cpuMs > limits.cpuMs) {
            return {
              type: "resource-exceeded",
              resource: "cpu",
              limit: limits.cpuMs,
              detail: `cpu time ${sample.cpuMs}ms over ${limits.cpuMs}ms`,
              metrics: metrics(),
            };
          }
        }
        yield* sleep(interval);
      }
    }

    try {
      return yield* race([completion(), deadline(), watchdog()]);
    } finally {
      // the leader may be gone while processes it started live on
      killGroup(child);
      if (!terminated) {
        yield* race([termination.operation, sleep(KILL_GRACE_MS)]);
      }
    }
  });
}
