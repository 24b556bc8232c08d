export { PositionSizer, floorToDecimals, ceilToDecimals } from './PositionSizer.js';
export { RetryPolicy, defaultSleep } from './RetryPolicy.js';
export type { RetryPolicyConfig, RetryPredicate, Sleep } from './RetryPolicy.js';
export { PaperOrderClient } from './PaperOrderClient.js';
export { ClobOrderClient, parsePostOrderResponse, balanceToContracts } from './ClobOrderClient.js';
export { OrderRejectedError, TransientOrderError, isTransientError } from './errors.js';
export type {
  OrderExecution,
  PositionSizerConfig,
  PositionSizeResult,
  ClobOrderClientConfig,
} from './types.js';
