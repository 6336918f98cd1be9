import { describe, expect, it } from '@jest/globals';
import { isDebugLoggingEnabled, isGenericDebugEnabled } from './debug-flags.js';
import { DEFAULT_RUNTIME_CONFIG, applyEnvironmentOverrides } from './runtime-config.js';

describe('debug-flags', () => {
  it('accepts the generic DEBUG_MODE switch', () => {
    expect(isGenericDebugEnabled({ DEBUG_MODE: 'true' })).toBe(true);
    expect(isGenericDebugEnabled({ DEBUG_MODE: 'on' })).toBe(true);
    expect(isGenericDebugEnabled({ DEBUG_MODE: 'false' })).toBe(false);
    expect(isGenericDebugEnabled({})).toBe(false);
  });

  it('follows the resolved config flag', () => {
    expect(isDebugLoggingEnabled({ debug: { loggingEnabled: true } }, {})).toBe(true);
    expect(isDebugLoggingEnabled({ debug: { loggingEnabled: false } }, {})).toBe(false);
  });

  it('enables logging for CHATRELAY_DEBUG=1 once environment overrides are applied', () => {
    const config = applyEnvironmentOverrides(DEFAULT_RUNTIME_CONFIG, { CHATRELAY_DEBUG: '1' });

    expect(isDebugLoggingEnabled(config, {})).toBe(true);
  });

  it('treats DEBUG_MODE as an extra switch on top of the config', () => {
    const config = applyEnvironmentOverrides(DEFAULT_RUNTIME_CONFIG, { CHATRELAY_DEBUG: '0' });

    expect(isDebugLoggingEnabled(config, { DEBUG_MODE: 'yes' })).toBe(true);
    expect(isDebugLoggingEnabled(config, {})).toBe(false);
  });
});
