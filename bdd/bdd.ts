import { Err, Ok, type Operation, type Result, run } from "effection";

export interface TestOperation {
  (): Operation<void>;
}

/**
 * The runner functions this module drives, shaped after `node:test`.
 */
export interface TestPrimitives {
  describe: {
    (name: string, fn: () => void): void;
    skip: (name: string, fn: () => void) => void;
  };
  it: {
    (name: string, fn: () => Promise<void>): void;
    skip: (name: string, fn: () => void) => void;
  };
}

export interface BDD {
  describe: {
    (name: string, body: () => void): void;
    skip: (name: string, body: () => void) => void;
  };
  it: {
    (desc: string, body?: TestOperation): void;
    skip: (desc: string, body?: TestOperation) => void;
  };
  beforeEach: (body: TestOperation) => void;
}

interface Suite {
  readonly name: string;
  readonly parent?: Suite;
  readonly setup: TestOperation[];
}

function lineage(suite: Suite | undefined): Suite[] {
  let chain: Suite[] = [];
  for (let current = suite; current; current = current.parent) {
    chain.unshift(current);
  }
  return chain;
}

function* box(body: TestOperation): Operation<Result<void>> {
  try {
    return Ok(yield* body());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Every test runs inside its own effection scope: setup from each enclosing
 * `describe()` first, then the body. Whatever the test started is torn down
 * when the scope exits, before the runner moves on.
 */
export function createBDD(primitives: TestPrimitives): BDD {
  let { describe: $describe, it: $it } = primitives;
  let current: Suite | undefined;

  function describe(name: string, body: () => void): void {
    let parent = current;
    try {
      current = { name, parent, setup: [] };
      $describe(name, body);
    } finally {
      current = parent;
    }
  }

  describe.skip = (name: string, body: () => void) => $describe.skip(name, body);

  function beforeEach(body: TestOperation): void {
    if (!current) {
      throw new Error("beforeEach() must be called inside describe()");
    }
    current.setup.push(body);
  }

  function it(desc: string, body?: TestOperation): void {
    if (!body) {
      $it.skip(desc, () => {});
      return;
    }
    let setups = lineage(current).flatMap((suite) => suite.setup);
    $it(desc, async () => {
      let result = await run(() =>
        box(function* () {
          for (let setup of setups) {
            yield* setup();
          }
          yield* body();
        })
      );
      if (!result.ok) {
        throw result.error;
      }
    });
  }

  it.skip = (desc: string, _body?: TestOperation) => $it.skip(desc, () => {});

  return { describe, it, beforeEach };
}
