import { workerMain } from "../../src/worker-main.ts";

await workerMain(function* (): Generator<never, number> {
  let total = 0;
  while (total >= 0) {
    total += Math.random();
  }
  return total;
});
