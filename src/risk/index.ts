export { ConstraintGate, describeFailures } from './ConstraintGate.js';
export type {
  ConstraintName,
  ConstraintGateConfig,
  ConstraintInput,
  ConstraintFailure,
  GateResult,
} from './types.js';
