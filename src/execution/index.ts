export {
  ExecutionEnvelope,
  ExecutionRequestSchema,
  toFault,
  validateExecutionRequest,
} from './envelope.js';
export {
  isExecutionSuccess,
  type ExecutionFault,
  type ExecutionOutcome,
  type ExecutionRequest,
  type ExecutionSuccess,
  type FaultKind,
} from './types.js';
