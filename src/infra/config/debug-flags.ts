import type { ChatRelayRuntimeConfig } from './runtime-config.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function isTruthy(value: string | undefined): boolean {
  return typeof value === 'string' && TRUE_VALUES.has(value.trim().toLowerCase());
}

export function isGenericDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthy(env.DEBUG_MODE);
}

/**
 * Debug logging is on when the resolved config says so (chatrelay.json or
 * CHATRELAY_DEBUG, already applied) or the generic DEBUG_MODE switch is set.
 */
export function isDebugLoggingEnabled(
  config: Pick<ChatRelayRuntimeConfig, 'debug'>,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return config.debug.loggingEnabled || isGenericDebugEnabled(env);
}
