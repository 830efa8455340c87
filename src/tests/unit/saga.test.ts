import assert from "node:assert/strict";
import test from "node:test";
import { runSaga, SagaStep } from "../../lifecycle/saga";
import { createRecordingLogger, silentLogger } from "../helpers/fixtures";

function step(name: string, trace: string[], options: { fail?: boolean; failCompensation?: boolean } = {}): SagaStep<string[]> {
  return {
    name,
    execute: async () => {
      if (options.fail) {
        throw new Error(`${name} failed`);
      }
      trace.push(`do:${name}`);
    },
    compensate: async () => {
      if (options.failCompensation) {
        throw new Error(`${name} undo failed`);
      }
      trace.push(`undo:${name}`);
    },
  };
}

test("completes when every step succeeds", async () => {
  const trace: string[] = [];
  const outcome = await runSaga("demo", [step("a", trace), step("b", trace)], trace, silentLogger);
  assert.equal(outcome.state, "completed");
  assert.deepEqual(outcome.completedSteps, ["a", "b"]);
  assert.equal(outcome.failedStep, null);
  assert.deepEqual(trace, ["do:a", "do:b"]);
});

test("compensates completed steps in reverse order", async () => {
  const trace: string[] = [];
  const outcome = await runSaga(
    "demo",
    [step("a", trace), step("b", trace), step("c", trace, { fail: true })],
    trace,
    silentLogger,
  );
  assert.equal(outcome.state, "compensated");
  assert.equal(outcome.failedStep, "c");
  assert.ok(outcome.error instanceof Error);
  assert.equal(outcome.error.message, "c failed");
  assert.deepEqual(trace, ["do:a", "do:b", "undo:b", "undo:a"]);
});

test("ends failed when a compensation throws and still runs the rest", async () => {
  const trace: string[] = [];
  const logger = createRecordingLogger();
  const outcome = await runSaga(
    "demo",
    [step("a", trace), step("b", trace, { failCompensation: true }), step("c", trace, { fail: true })],
    trace,
    logger,
    { internalId: "id-1" },
  );
  assert.equal(outcome.state, "failed");
  assert.deepEqual(outcome.compensationFailures, [{ step: "b", error: "b undo failed" }]);
  assert.deepEqual(trace, ["do:a", "do:b", "undo:a"]);

  const failure = logger.entries.find((entry) => entry.message === "saga.compensation.failed");
  assert.equal(failure?.level, "error");
  assert.equal(failure?.meta?.internalId, "id-1");
});
