export { BridgeError, wrapError } from './bridge-error.js';
export type { BridgeErrorCode, BridgeErrorDetails } from './bridge-error.js';
