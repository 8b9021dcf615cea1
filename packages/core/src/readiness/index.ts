export { systemClock, throwIfCancelled, type Clock } from './clock.js';
export { pollUntil, type PollOptions, type PollOutcome } from './poll.js';
export * from './predicates.js';
export {
  ReadinessEvaluator,
  describePredicate,
  type ReadinessEvaluatorConfig,
  type ReadinessResult,
  type WaitOptions,
} from './readiness-evaluator.js';
