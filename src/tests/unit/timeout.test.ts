import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { PipelineCancelledError } from "../../shared/errors";
import { throwIfCancelled, withTimeout } from "../../shared/utils/timeout";

const activeTimers = (): number =>
  process.getActiveResourcesInfo().filter((resource) => resource === "Timeout").length;

const never = (): Promise<never> => new Promise<never>(() => undefined);

describe("withTimeout", () => {
  it("passes a value through", async () => {
    assert.equal(await withTimeout(Promise.resolve(7), 1000, () => new Error("late")), 7);
  });

  it("rejects with the timeout error", async () => {
    await assert.rejects(withTimeout(never(), 10, () => new Error("too slow")), { message: "too slow" });
  });

  it("clears its timer when the signal aborts", async () => {
    const controller = new AbortController();
    const before = activeTimers();
    const pending = withTimeout(never(), 60_000, () => new Error("late"), controller.signal);
    assert.equal(activeTimers(), before + 1);

    controller.abort();
    await assert.rejects(pending, PipelineCancelledError);
    assert.equal(activeTimers(), before);
  });

  it("rejects at once for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const before = activeTimers();
    await assert.rejects(withTimeout(never(), 60_000, () => new Error("late"), controller.signal), PipelineCancelledError);
    assert.equal(activeTimers(), before);
  });
});

describe("throwIfCancelled", () => {
  it("throws only once the signal has aborted", () => {
    const controller = new AbortController();
    assert.doesNotThrow(() => throwIfCancelled(controller.signal));
    controller.abort();
    assert.throws(() => throwIfCancelled(controller.signal), PipelineCancelledError);
  });
});
