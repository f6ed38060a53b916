import { describe, expect, it } from 'vitest';
import { loadEnvConfig } from './validate';
import { ConfigValidationError } from '../errors';

describe('loadEnvConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({
      SNMPTRANSLATE_BIN: 'snmptranslate',
      MIB_LOAD_TIMEOUT_MS: 15000,
      MIB_ENUM_TIMEOUT_MS: 30000,
      MIB_SYMBOL_TIMEOUT_MS: 10000,
      MIB2TEMPLATE_VERBOSE: false
    });
  });

  it('reads overrides', () => {
    const config = loadEnvConfig({
      SNMPTRANSLATE_BIN: '/opt/net-snmp/bin/snmptranslate',
      MIB_SYMBOL_TIMEOUT_MS: '2500',
      MIB2TEMPLATE_VERBOSE: 'yes'
    });

    expect(config.SNMPTRANSLATE_BIN).toBe('/opt/net-snmp/bin/snmptranslate');
    expect(config.MIB_SYMBOL_TIMEOUT_MS).toBe(2500);
    expect(config.MIB2TEMPLATE_VERBOSE).toBe(true);
  });

  it('treats unknown flag values as off', () => {
    expect(loadEnvConfig({ MIB2TEMPLATE_VERBOSE: 'maybe' }).MIB2TEMPLATE_VERBOSE).toBe(false);
  });

  it('throws when a timeout is not a number', () => {
    expect(() => loadEnvConfig({ MIB_LOAD_TIMEOUT_MS: 'soon' })).toThrow(ConfigValidationError);
  });

  it('lists every invalid value', () => {
    try {
      loadEnvConfig({ MIB_LOAD_TIMEOUT_MS: '0', MIB_ENUM_TIMEOUT_MS: '1.5', SNMPTRANSLATE_BIN: ' ' });
      expect.unreachable('loadEnvConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      const message = error instanceof Error ? error.message : '';
      expect(message.split('\n')[0]).toBe('Found 3 configuration error(s):');
      expect(message).toContain('  - SNMPTRANSLATE_BIN: SNMPTRANSLATE_BIN must not be empty');
      expect(message).toContain('  - MIB_LOAD_TIMEOUT_MS: ');
      expect(message).toContain('  - MIB_ENUM_TIMEOUT_MS: ');
    }
  });
});
