/**
 * Quality gates and the decision gate.
 *
 * @packageDocumentation
 */

export * from './types.js';
export { QualityGateEvaluator, formatBlocker, summarizeChecks } from './evaluator.js';
export {
  DecisionGateController,
  GateNotReadyError,
  crossCuttingChecks,
} from './decision.js';
export type { GateDecisionInput } from './decision.js';
