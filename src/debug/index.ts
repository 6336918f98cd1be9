/**
 * Debug instrumentation API.
 *
 * Modules emit debug events through `debug`; the CLI subscribes through
 * `debugEmitter` and prints them when debug logging is switched on.
 * Strings that look like API keys are redacted before delivery.
 *
 * @example
 * ```typescript
 * import { debug, debugEmitter } from './debug/index.js';
 *
 * debugEmitter.enable();
 * debug.setContext({ sessionId: 'default' });
 * debug.chatTurnStart('default', 'Hello');
 * debug.clearContext();
 * ```
 */

export { debugEmitter, DebugEmitter, REDACTED } from './emitter.js';
export { debug } from './debug.js';
export type { DebugEvent, DebugEventType, DebugContext } from './types.js';
