import { describe as $describe, it as $it } from "node:test";
import { createBDD } from "./bdd.ts";

export type { BDD, TestOperation, TestPrimitives } from "./bdd.ts";
export { createBDD } from "./bdd.ts";

export const { describe, it, beforeEach } = createBDD({
  describe: $describe,
  it: $it,
});
