/**
 * Console logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger } from '../logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print debug messages only when enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    createConsoleLogger(false).debug('hidden');
    createConsoleLogger(true).debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[deepcall] shown');
  });

  it('should always print warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createConsoleLogger(false).warn('careful');

    expect(warn).toHaveBeenCalledWith('[deepcall] careful');
  });
});
