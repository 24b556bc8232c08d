export { PositionStateMachine } from './PositionStateMachine.js';
export type {
  PositionState,
  CloseReason,
  PositionClose,
  Position,
  PositionMachineConfig,
  EntryContext,
  EntryOutcome,
  ExitContext,
  ExitOutcome,
  SettlementOutcome,
  Settlement,
  PositionMachineEvents,
} from './types.js';
