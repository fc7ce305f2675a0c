/**
 * Transition logging helpers.
 *
 * Keep the log shape of every transition attempt identical across the
 * executor and the host adapter.
 */
import { TRACE_TIMING } from "./scoped.js";
import type { Logger } from "./types.js";

/**
 * Base context for transition logging.
 */
export type BaseTransitionLogContext = {
  workflow: string;
  event: string;
  from: string;
  [key: string]: unknown;
};

/**
 * Log the start of a transition attempt, after resolution succeeded.
 */
export function logTransitionStarted(
  logger: Logger,
  context: BaseTransitionLogContext,
  to: string
): void {
  logger.debug("Transition started", { ...context, to });
}

/**
 * Log a completed transition (state mutated, on_entry fired).
 */
export function logTransitionCompleted(
  logger: Logger,
  context: BaseTransitionLogContext,
  to: string
): void {
  logger.info("Transition completed", { ...context, to });
}

/**
 * Log a transition aborted by a halt inside the action.
 */
export function logTransitionHalted(
  logger: Logger,
  context: BaseTransitionLogContext,
  reason: string | undefined
): void {
  logger.warn("Transition halted", {
    ...context,
    reason: reason ?? null,
  });
}

/**
 * Log an event that is not legal in the current state.
 */
export function logUndefinedTransition(
  logger: Logger,
  context: BaseTransitionLogContext,
  legalEvents: readonly string[]
): void {
  logger.warn("Undefined transition", {
    ...context,
    legalEvents: [...legalEvents],
  });
}

/**
 * Log a routine that threw while a transition was running.
 */
export function logTransitionFailed(
  logger: Logger,
  context: BaseTransitionLogContext,
  stage: string,
  error: unknown
): void {
  logger.error("Transition failed", {
    ...context,
    stage,
    error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
  });
}

/**
 * Run the routines of one stage between a TRACE start and end mark. The end
 * mark is written even when a routine throws or halts.
 */
export function traceStage(
  logger: Logger,
  context: BaseTransitionLogContext,
  stage: string,
  run: () => void
): void {
  const message = `Stage ${stage}`;
  logger.trace(message, { ...context, stage, timing: TRACE_TIMING.START });
  try {
    run();
  } finally {
    logger.trace(message, { ...context, stage, timing: TRACE_TIMING.END });
  }
}

/**
 * Summary of one transition attempt that got past resolution.
 */
export type TransitionSummary =
  | { status: "transitioned"; to: string; routines: number }
  | { status: "halted"; reason: string | undefined; routines: number };

/**
 * Emit the REPORT line summarising a transition attempt.
 */
export function reportTransition(
  logger: Logger,
  context: BaseTransitionLogContext,
  summary: TransitionSummary
): void {
  if (summary.status === "halted") {
    logger.report("Transition summary", {
      ...context,
      status: summary.status,
      reason: summary.reason ?? null,
      routines: summary.routines,
    });
    return;
  }
  logger.report("Transition summary", { ...context, ...summary });
}
