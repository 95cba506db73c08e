import { describe, it, expect } from 'vitest';
import { EnvironmentConfigError, silentLogger } from '@veilprint/core';

import { createEngine, engineOptionsFromEnv, parseEnvironment } from '../env.js';

describe('parseEnvironment', () => {
  it('leaves unset and empty variables out', () => {
    expect(parseEnvironment({})).toEqual({});
    expect(parseEnvironment({ VEILPRINT_ENABLED: '', VEILPRINT_LOG_LEVEL: '' })).toEqual({});
  });

  it('parses switches, levels and capacities', () => {
    expect(
      parseEnvironment({
        VEILPRINT_ENABLED: ' Off ',
        VEILPRINT_LOG_LEVEL: 'DEBUG',
        VEILPRINT_HISTORY_CAPACITY: '250',
      }),
    ).toEqual({ enabled: false, logLevel: 'debug', historyCapacity: 250 });
    expect(parseEnvironment({ VEILPRINT_ENABLED: 'yes' })).toEqual({ enabled: true });
  });

  it('ignores unrelated variables', () => {
    expect(parseEnvironment({ HOME: '/home/test', VEILPRINT_ENABLED: '1' })).toEqual({ enabled: true });
  });

  it('throws EnvironmentConfigError listing every bad variable', () => {
    let caught: unknown;
    try {
      parseEnvironment({ VEILPRINT_ENABLED: 'maybe', VEILPRINT_HISTORY_CAPACITY: '0' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EnvironmentConfigError);
    if (!(caught instanceof EnvironmentConfigError)) return;
    expect(caught.errors).toEqual([
      'VEILPRINT_ENABLED: expected one of 1/0, true/false, yes/no, on/off',
      'VEILPRINT_HISTORY_CAPACITY: expected a positive integer',
    ]);
  });

  it('rejects unknown log levels', () => {
    expect(() => parseEnvironment({ VEILPRINT_LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid environment configuration: VEILPRINT_LOG_LEVEL: expected one of debug, info, warn, error',
    );
  });
});

describe('engineOptionsFromEnv', () => {
  it('carries the switch and history capacity and always supplies a logger', () => {
    const options = engineOptionsFromEnv({ VEILPRINT_ENABLED: '0', VEILPRINT_HISTORY_CAPACITY: '5' });
    expect(options.enabled).toBe(false);
    expect(options.historyCapacity).toBe(5);
    expect(options.logger).toBeDefined();
  });
});

describe('createEngine', () => {
  it('lets explicit options win over the environment', () => {
    expect(createEngine({ logger: silentLogger }, { VEILPRINT_ENABLED: 'no' }).enabled).toBe(false);
    expect(createEngine({ logger: silentLogger, enabled: true }, { VEILPRINT_ENABLED: 'no' }).enabled).toBe(true);
  });

  it('bounds detector history by the configured capacity', () => {
    const engine = createEngine({ logger: silentLogger }, { VEILPRINT_HISTORY_CAPACITY: '3' });
    for (let i = 0; i < 5; i++) engine.recordOperation('ctx-1', 'fillRect');
    expect(engine.detector.history('ctx-1')).toHaveLength(3);
  });
});
