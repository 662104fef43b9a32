import { readdir, readFile } from "node:fs/promises";
import process from "node:process";
import { all, type Operation, until } from "effection";
import { errnoCode } from "./api.ts";

export interface ProcessSample {
  rssKb: number;
  peakRssKb: number;
  cpuMs: number;
}

// USER_HZ is 100 on every Linux ABI node ships for
const CLOCK_TICKS_PER_SECOND = 100;

function kilobytes(status: string, field: string): number {
  let match = new RegExp(`^${field}:\\s+(\\d+) kB`, "m").exec(status);
  return match ? Number(match[1]) : 0;
}

function fieldsOf(stat: string): string[] {
  // the command name is parenthesized and may itself contain spaces
  return stat.slice(stat.lastIndexOf(")") + 2).split(" ");
}

export function parseSample(status: string, stat: string): ProcessSample {
  let fields = fieldsOf(stat);
  let utime = Number(fields[11]);
  let stime = Number(fields[12]);
  return {
    rssKb: kilobytes(status, "VmRSS"),
    peakRssKb: kilobytes(status, "VmHWM"),
    cpuMs: ((utime + stime) * 1000) / CLOCK_TICKS_PER_SECOND,
  };
}

/**
 * Process group of a `/proc/<pid>/stat` line.
 */
export function groupOf(stat: string): number {
  return Number(fieldsOf(stat)[2]);
}

/**
 * Add up member samples. Resident memory and CPU time are summed; the
 * peak is the larger of the summed resident memory and any member's own
 * high-water mark.
 */
export function combineSamples(
  samples: ProcessSample[],
): ProcessSample | undefined {
  if (samples.length === 0) {
    return undefined;
  }
  let total = { rssKb: 0, peakRssKb: 0, cpuMs: 0 };
  for (let sample of samples) {
    total.rssKb += sample.rssKb;
    total.cpuMs += sample.cpuMs;
    total.peakRssKb = Math.max(total.peakRssKb, sample.peakRssKb);
  }
  return { ...total, peakRssKb: Math.max(total.peakRssKb, total.rssKb) };
}

function* sampleMember(
  pid: string,
  pgid: number,
): Operation<ProcessSample | undefined> {
  try {
    let stat = yield* until(readFile(`/proc/${pid}/stat`, "utf8"));
    if (groupOf(stat) !== pgid) {
      return undefined;
    }
    let status = yield* until(readFile(`/proc/${pid}/status`, "utf8"));
    return parseSample(status, stat);
  } catch (error) {
    let code = errnoCode(error);
    // the process exited between listing and reading
    if (code === "ENOENT" || code === "ESRCH") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Read memory and CPU usage of every live process in a process group from
 * procfs. Returns `undefined` where procfs is not available or the whole
 * group has gone.
 */
export function* sampleGroup(
  pgid: number,
): Operation<ProcessSample | undefined> {
  if (process.platform !== "linux") {
    return undefined;
  }
  let entries = yield* until(readdir("/proc"));
  let members = yield* all(
    entries
      .filter((entry) => /^\d+$/.test(entry))
      .map((pid) => sampleMember(pid, pgid)),
  );
  return combineSamples(
    members.filter((sample): sample is ProcessSample => sample !== undefined),
  );
}
