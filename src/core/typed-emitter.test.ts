import { beforeEach, describe, expect, it } from "vitest";
import type { ListenerErrorHandler } from "./typed-emitter.js";
import { TypedEventEmitter } from "./typed-emitter.js";

// ---------------------------------------------------------------------------
// Test subclass — exposes protected `emit` for testing
// ---------------------------------------------------------------------------

interface TestEvents {
  "restart:attempt": { attempt: number };
  "probe:value": string;
}

class TestEmitter extends TypedEventEmitter<TestEvents> {
  constructor(onListenerError?: ListenerErrorHandler) {
    super(onListenerError);
  }

  public testEmit<K extends keyof TestEvents & string>(event: K, payload: TestEvents[K]): boolean {
    return this.emit(event, payload);
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("TypedEventEmitter", () => {
  let emitter: TestEmitter;

  beforeEach(() => {
    emitter = new TestEmitter();
  });

  // -----------------------------------------------------------------------
  // on
  // -----------------------------------------------------------------------

  describe("on", () => {
    it("receives emitted events", () => {
      const received: { attempt: number }[] = [];
      emitter.on("restart:attempt", (payload) => received.push(payload));

      emitter.testEmit("restart:attempt", { attempt: 2 });

      expect(received).toEqual([{ attempt: 2 }]);
    });

    it("fires on every emit", () => {
      const received: string[] = [];
      emitter.on("probe:value", (payload) => received.push(payload));

      emitter.testEmit("probe:value", "first");
      emitter.testEmit("probe:value", "second");

      expect(received).toEqual(["first", "second"]);
    });

    it("returns this for chaining", () => {
      const result = emitter.on("restart:attempt", () => {});
      expect(result).toBe(emitter);
    });
  });

  // -----------------------------------------------------------------------
  // once
  // -----------------------------------------------------------------------

  describe("once", () => {
    it("fires only once", () => {
      const received: string[] = [];
      emitter.once("probe:value", (payload) => received.push(payload));

      emitter.testEmit("probe:value", "first");
      emitter.testEmit("probe:value", "second");

      expect(received).toEqual(["first"]);
    });

    it("returns this for chaining", () => {
      const result = emitter.once("probe:value", () => {});
      expect(result).toBe(emitter);
    });
  });

  // -----------------------------------------------------------------------
  // off
  // -----------------------------------------------------------------------

  describe("off", () => {
    it("removes a specific listener", () => {
      const received: string[] = [];
      const listener = (payload: string) => received.push(payload);

      emitter.on("probe:value", listener);
      emitter.testEmit("probe:value", "before");

      emitter.off("probe:value", listener);
      emitter.testEmit("probe:value", "after");

      expect(received).toEqual(["before"]);
    });

    it("does not affect other listeners on the same event", () => {
      const receivedA: string[] = [];
      const receivedB: string[] = [];
      const listenerA = (payload: string) => receivedA.push(payload);
      const listenerB = (payload: string) => receivedB.push(payload);

      emitter.on("probe:value", listenerA);
      emitter.on("probe:value", listenerB);
      emitter.off("probe:value", listenerA);

      emitter.testEmit("probe:value", "hello");

      expect(receivedA).toEqual([]);
      expect(receivedB).toEqual(["hello"]);
    });

    it("returns this for chaining", () => {
      const listener = () => {};
      emitter.on("probe:value", listener);
      const result = emitter.off("probe:value", listener);
      expect(result).toBe(emitter);
    });
  });

  // -----------------------------------------------------------------------
  // removeAllListeners
  // -----------------------------------------------------------------------

  describe("removeAllListeners", () => {
    it("removes all listeners for a specific event", () => {
      const receivedAttempts: { attempt: number }[] = [];
      const receivedValues: string[] = [];

      emitter.on("restart:attempt", (payload) => receivedAttempts.push(payload));
      emitter.on("probe:value", (payload) => receivedValues.push(payload));

      emitter.removeAllListeners("restart:attempt");

      emitter.testEmit("restart:attempt", { attempt: 1 });
      emitter.testEmit("probe:value", "still here");

      expect(receivedAttempts).toEqual([]);
      expect(receivedValues).toEqual(["still here"]);
    });

    it("removes all listeners for all events when called without arguments", () => {
      const receivedAttempts: { attempt: number }[] = [];
      const receivedValues: string[] = [];

      emitter.on("restart:attempt", (payload) => receivedAttempts.push(payload));
      emitter.on("probe:value", (payload) => receivedValues.push(payload));

      emitter.removeAllListeners();

      emitter.testEmit("restart:attempt", { attempt: 1 });
      emitter.testEmit("probe:value", "gone");

      expect(receivedAttempts).toEqual([]);
      expect(receivedValues).toEqual([]);
    });

    it("returns this for chaining", () => {
      const result = emitter.removeAllListeners("restart:attempt");
      expect(result).toBe(emitter);
    });
  });

  // -----------------------------------------------------------------------
  // listenerCount
  // -----------------------------------------------------------------------

  describe("listenerCount", () => {
    it("returns 0 when no listeners are registered", () => {
      expect(emitter.listenerCount("restart:attempt")).toBe(0);
    });

    it("returns correct count after adding listeners", () => {
      emitter.on("restart:attempt", () => {});
      emitter.on("restart:attempt", () => {});
      emitter.on("probe:value", () => {});

      expect(emitter.listenerCount("restart:attempt")).toBe(2);
      expect(emitter.listenerCount("probe:value")).toBe(1);
    });

    it("decrements after removing a listener", () => {
      const listener = () => {};
      emitter.on("restart:attempt", listener);
      emitter.on("restart:attempt", () => {});

      expect(emitter.listenerCount("restart:attempt")).toBe(2);

      emitter.off("restart:attempt", listener);
      expect(emitter.listenerCount("restart:attempt")).toBe(1);
    });

    it("returns 0 after removeAllListeners", () => {
      emitter.on("restart:attempt", () => {});
      emitter.on("restart:attempt", () => {});
      emitter.removeAllListeners("restart:attempt");

      expect(emitter.listenerCount("restart:attempt")).toBe(0);
    });
  });

  // -----------------------------------------------------------------------
  // emit
  // -----------------------------------------------------------------------

  describe("emit", () => {
    it("returns false when no listeners are registered", () => {
      expect(emitter.testEmit("restart:attempt", { attempt: 1 })).toBe(false);
    });

    it("returns true when at least one listener is registered", () => {
      emitter.on("restart:attempt", () => {});
      expect(emitter.testEmit("restart:attempt", { attempt: 1 })).toBe(true);
    });
  });

  // -----------------------------------------------------------------------
  // Multiple event types
  // -----------------------------------------------------------------------

  describe("multiple event types", () => {
    it("events of different types are independent", () => {
      const attemptPayloads: { attempt: number }[] = [];
      const valuePayloads: string[] = [];

      emitter.on("restart:attempt", (payload) => attemptPayloads.push(payload));
      emitter.on("probe:value", (payload) => valuePayloads.push(payload));

      emitter.testEmit("restart:attempt", { attempt: 1 });
      emitter.testEmit("probe:value", "hello");
      emitter.testEmit("restart:attempt", { attempt: 2 });

      expect(attemptPayloads).toEqual([{ attempt: 1 }, { attempt: 2 }]);
      expect(valuePayloads).toEqual(["hello"]);
    });
  });

  // -----------------------------------------------------------------------
  // listener errors
  // -----------------------------------------------------------------------

  describe("listener errors", () => {
    it("propagate to the emitter without a handler", () => {
      emitter.on("probe:value", () => {
        throw new Error("listener broke");
      });

      expect(() => emitter.testEmit("probe:value", "5")).toThrow("listener broke");
    });

    it("are reported to the handler while later listeners still run", () => {
      const reported: Array<[string, unknown]> = [];
      const guarded = new TestEmitter((event, error) => reported.push([event, error]));
      const failure = new Error("listener broke");
      const received: string[] = [];
      guarded.on("probe:value", () => {
        throw failure;
      });
      guarded.on("probe:value", (payload) => received.push(payload));

      expect(guarded.testEmit("probe:value", "5")).toBe(true);

      expect(reported).toEqual([["probe:value", failure]]);
      expect(received).toEqual(["5"]);
    });

    it("still removes once listeners when guarded", () => {
      const guarded = new TestEmitter(() => {});
      const received: string[] = [];
      guarded.once("probe:value", (payload) => received.push(payload));

      guarded.testEmit("probe:value", "first");
      guarded.testEmit("probe:value", "second");

      expect(received).toEqual(["first"]);
      expect(guarded.listenerCount("probe:value")).toBe(0);
    });

    it("returns false when nobody listens", () => {
      const guarded = new TestEmitter(() => {});
      expect(guarded.testEmit("probe:value", "5")).toBe(false);
    });
  });
});
