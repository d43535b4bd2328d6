/**
 * Engine configuration tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_DEPTH, readEnvConfig, resolveEngineConfig } from '../config.js';

describe('resolveEngineConfig', () => {
  it('should use defaults without options or environment', () => {
    expect(resolveEngineConfig({}, {})).toEqual({
      maxDepth: DEFAULT_MAX_DEPTH,
      compressTraces: true,
      debug: false,
    });
  });

  it('should read DEEPCALL_* variables', () => {
    const env = { DEEPCALL_MAX_DEPTH: '50', DEEPCALL_COMPRESS_TRACES: 'false', DEEPCALL_DEBUG: 'true', PATH: '/bin' };

    expect(resolveEngineConfig({}, env)).toEqual({ maxDepth: 50, compressTraces: false, debug: true });
  });

  it('should let options override the environment', () => {
    const env = { DEEPCALL_MAX_DEPTH: '50', DEEPCALL_DEBUG: 'true' };

    expect(resolveEngineConfig({ maxDepth: 10, debug: undefined }, env)).toEqual({
      maxDepth: 10,
      compressTraces: true,
      debug: true,
    });
  });

  it('should ignore empty environment values', () => {
    expect(readEnvConfig({ DEEPCALL_MAX_DEPTH: '  ', DEEPCALL_DEBUG: '' })).toEqual({});
  });

  it('should reject invalid options', () => {
    expect(() => resolveEngineConfig({ maxDepth: 1 }, {})).toThrow(/Invalid engine config: maxDepth/);
    expect(() => resolveEngineConfig({ maxDepth: 2.5 }, {})).toThrow(/Invalid engine config: maxDepth/);
  });

  it('should reject invalid environment values', () => {
    expect(() => readEnvConfig({ DEEPCALL_MAX_DEPTH: 'deep' })).toThrow(/Invalid environment: DEEPCALL_MAX_DEPTH/);
    expect(() => readEnvConfig({ DEEPCALL_DEBUG: 'maybe' })).toThrow(/Invalid environment: DEEPCALL_DEBUG/);
  });

  it('should list every invalid setting', () => {
    expect(() => readEnvConfig({ DEEPCALL_MAX_DEPTH: 'deep', DEEPCALL_DEBUG: 'maybe' })).toThrow(
      /^Invalid environment: DEEPCALL_MAX_DEPTH: .+; DEEPCALL_DEBUG: .+$/
    );
  });
});
