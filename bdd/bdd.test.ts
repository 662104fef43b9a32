import { createContext, resource, sleep, suspend } from "effection";
import { expect } from "expect";
import { beforeEach, describe, it } from "./mod.ts";

const Greeting = createContext<string>("test.greeting", "hello");

describe("bdd", () => {
  let teardowns = 0;

  beforeEach(function* () {
    yield* Greeting.set("outer");
  });

  it("runs generator bodies as operations", function* () {
    yield* sleep(1);
    expect(yield* Greeting.expect()).toEqual("outer");
  });

  describe("nested", () => {
    beforeEach(function* () {
      let greeting = yield* Greeting.expect();
      yield* Greeting.set(`${greeting} > inner`);
    });

    it("runs setup from outer suites first", function* () {
      expect(yield* Greeting.expect()).toEqual("outer > inner");
    });
  });

  describe("teardown", () => {
    it("starts a resource", function* () {
      yield* resource<void>(function* (provide) {
        try {
          yield* provide();
        } finally {
          teardowns++;
        }
      });
    });

    it("has torn it down before the next test", function* () {
      expect(teardowns).toEqual(1);
    });
  });

  it("does not leak background tasks", function* () {
    yield* resource<void>(function* (provide) {
      yield* provide();
      yield* suspend();
    });
  });
});
