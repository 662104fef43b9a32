import {
  createQueue,
  type Operation,
  resource,
  spawn,
  type Task,
  withResolvers,
} from "effection";

/**
 * A bounded pool of tasks. `yield* buffer` waits until everything spawned
 * into it so far has finished.
 */
export interface TaskBuffer extends Operation<void> {
  /**
   * Queue an operation. The returned operation yields its task once a
   * slot is free and the task has started.
   */
  spawn<T>(operation: () => Operation<T>): Operation<Operation<Task<T>>>;
}

export function useTaskBuffer(max: number): Operation<TaskBuffer> {
  return resource(function* (provide) {
    let queue = createQueue<() => Operation<void>, never>();
    let active = 0;
    let pending = 0;
    let changed = withResolvers<void>();
    let notify = () => {
      let current = changed;
      changed = withResolvers<void>();
      current.resolve();
    };

    yield* spawn(function* () {
      while (true) {
        let next = yield* queue.next();
        if (next.done) {
          return;
        }
        while (active >= max) {
          yield* changed.operation;
        }
        yield* next.value();
      }
    });

    yield* provide({
      *spawn<T>(operation: () => Operation<T>) {
        let started = withResolvers<Task<T>>();
        pending++;
        queue.add(function* () {
          active++;
          pending--;
          let task = yield* spawn(function* () {
            try {
              return yield* operation();
            } finally {
              active--;
              notify();
            }
          });
          started.resolve(task);
        });
        return started.operation;
      },
      *[Symbol.iterator]() {
        while (active > 0 || pending > 0) {
          yield* changed.operation;
        }
      },
    });
  });
}
