/**
 * Conversation Domain - Re-exports
 */

export * from './session.js';
export * from './errors.js';
export * from './state-machine-rules.js';
