/**
 * @fileoverview Host bridge exports
 */

export * from './types.js';
export {
  HOST_SERIALIZER_ASSET,
  MAX_ROLLBACK_STEPS,
  buildRollbackScript,
  buildScriptWrapper,
  clampRollbackSteps,
  parseHostReply,
  parseRollbackReport,
} from './wrapper.js';
export {
  ProcessBridge,
  classifyDriverFailure,
  parseHostStatus,
  type DriverInvocation,
  type DriverMode,
  type DriverOutput,
  type ProcessBridgeOptions,
} from './process_bridge.js';
export { OsascriptBridge, DEFAULT_OSASCRIPT_TARGETS } from './osascript_bridge.js';
export { WindowsScriptHostBridge, DEFAULT_WSH_TARGETS } from './wsh_bridge.js';
export { createHostBridge } from './bridge_factory.js';
export { readAsset, resolveAssetPath } from './assets.js';
