import { errorMessage, Logger } from "../config/logger";

export type SagaState = "completed" | "compensated" | "failed";

export interface SagaStep<TContext> {
  name: string;
  execute(context: TContext): Promise<void>;
  /** Undo for a step that completed; runs in reverse order after a later step fails. */
  compensate?(context: TContext): Promise<void>;
}

export interface SagaOutcome {
  state: SagaState;
  completedSteps: string[];
  failedStep: string | null;
  error: unknown;
  compensationFailures: Array<{ step: string; error: string }>;
}

/**
 * Executes steps in order. When a step throws, completed steps are
 * compensated in reverse; the saga ends `compensated` when every
 * compensation succeeds and `failed` otherwise.
 */
export async function runSaga<TContext>(
  name: string,
  steps: ReadonlyArray<SagaStep<TContext>>,
  context: TContext,
  logger: Logger,
  meta: Record<string, unknown> = {},
): Promise<SagaOutcome> {
  const completed: Array<SagaStep<TContext>> = [];

  for (const step of steps) {
    try {
      await step.execute(context);
      completed.push(step);
    } catch (error) {
      logger.warn("saga.step.failed", {
        saga: name,
        step: step.name,
        error: errorMessage(error),
        ...meta,
      });
      return compensate(name, completed, step.name, error, context, logger, meta);
    }
  }

  return {
    state: "completed",
    completedSteps: completed.map((step) => step.name),
    failedStep: null,
    error: null,
    compensationFailures: [],
  };
}

async function compensate<TContext>(
  name: string,
  completed: ReadonlyArray<SagaStep<TContext>>,
  failedStep: string,
  cause: unknown,
  context: TContext,
  logger: Logger,
  meta: Record<string, unknown>,
): Promise<SagaOutcome> {
  const compensationFailures: Array<{ step: string; error: string }> = [];
  for (const step of [...completed].reverse()) {
    if (!step.compensate) {
      continue;
    }
    try {
      await step.compensate(context);
    } catch (error) {
      compensationFailures.push({ step: step.name, error: errorMessage(error) });
    }
  }

  const state: SagaState = compensationFailures.length === 0 ? "compensated" : "failed";
  if (state === "failed") {
    logger.error("saga.compensation.failed", {
      saga: name,
      failedStep,
      compensationFailures,
      ...meta,
    });
  } else {
    logger.info("saga.compensated", { saga: name, failedStep, ...meta });
  }

  return {
    state,
    completedSteps: completed.map((step) => step.name),
    failedStep,
    error: cause,
    compensationFailures,
  };
}
