export * from "./src/api.ts";
export * from "./src/messages.ts";
export {
  combineSamples,
  groupOf,
  parseSample,
  type ProcessSample,
  sampleGroup,
} from "./src/proc.ts";
export { addressSpaceOf, runProcess, withRlimits } from "./src/process.ts";
export { run } from "./src/sandbox.ts";
export { runWorker } from "./src/worker.ts";
