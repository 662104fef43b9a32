import { sleep, spawn, type Task, withResolvers } from "effection";
import { describe, it } from "@swhid-conformance/bdd";
import { expect } from "expect";
import { useTaskBuffer } from "./task-buffer.ts";

describe("TaskBuffer", () => {
  it("queues up tasks when the buffer fills up", function* () {
    let buffer = yield* useTaskBuffer(2);
    let gates = [withResolvers<void>(), withResolvers<void>(), withResolvers<void>()];
    let running = 0;
    let peak = 0;
    let work = (i: number) =>
      function* () {
        running++;
        peak = Math.max(peak, running);
        try {
          yield* gates[i].operation;
        } finally {
          running--;
        }
      };

    yield* buffer.spawn(work(0));
    yield* buffer.spawn(work(1));

    let third: Task<void> | undefined;
    yield* spawn(function* () {
      third = yield* yield* buffer.spawn(work(2));
    });

    yield* sleep(10);

    // the third is queued up, but not spawned
    expect(third).toBeUndefined();
    expect(running).toEqual(2);

    gates[0].resolve();
    yield* sleep(10);

    expect(third).toBeDefined();

    gates[1].resolve();
    gates[2].resolve();
    yield* buffer;

    expect(running).toEqual(0);
    expect(peak).toEqual(2);
  });

  it("allows to wait until buffer is drained", function* () {
    let finished = 0;
    let buffer = yield* useTaskBuffer(5);
    for (let i = 0; i < 3; i++) {
      yield* buffer.spawn(function* () {
        yield* sleep(5);
        finished++;
      });
    }

    expect(finished).toEqual(0);

    yield* buffer;

    expect(finished).toEqual(3);
  });

  it("hands back the task so its value can be read", function* () {
    let buffer = yield* useTaskBuffer(1);
    let task = yield* yield* buffer.spawn(function* () {
      yield* sleep(1);
      return "done";
    });
    expect(yield* task).toEqual("done");
  });
});
