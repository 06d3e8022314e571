/**
 * Request workflow: lifecycle states, steps and the sequencer that runs them
 */

export { RequestLifecycle, TRANSITIONS, type RequestState } from './states.js';
export { Step, type StepClass, type StepMiddleware } from './step.js';
export {
  ResolveItemsStep,
  PriceRequestStep,
  RecordSalesStep,
  EvaluateRestockStep,
  ProcessRestockStep,
} from './steps.js';
export { WorkflowSequencer, PLANS, rejectedResponse, type PlanEntry, type WorkflowSequencerOptions } from './sequencer.js';
export type {
  LineFailure,
  OrderResponse,
  RequestContext,
  ResolvedLine,
  ResponseStatus,
  RestockOutcome,
  SoldLine,
  StepServices,
} from './types.js';
