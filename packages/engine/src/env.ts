import { z } from 'zod';
import { EnvironmentConfigError, createLogger, parseLogLevel } from '@veilprint/core';
import type { LogLevel } from '@veilprint/core';

import { FingerprintEngine } from './engine.js';
import type { EngineOptions } from './types.js';

const FALSY = new Set(['0', 'false', 'no', 'off']);
const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const envSchema = z.object({
  VEILPRINT_ENABLED: z
    .string()
    .trim()
    .toLowerCase()
    .refine((v) => v === '' || FALSY.has(v) || TRUTHY.has(v), {
      message: 'expected one of 1/0, true/false, yes/no, on/off',
    })
    .optional(),
  VEILPRINT_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((v) => v === '' || parseLogLevel(v, 'error') === v, {
      message: 'expected one of debug, info, warn, error',
    })
    .optional(),
  VEILPRINT_HISTORY_CAPACITY: z
    .string()
    .trim()
    .refine((v) => v === '' || /^\d+$/.test(v), { message: 'expected a positive integer' })
    .refine((v) => v === '' || Number.parseInt(v, 10) > 0, { message: 'expected a positive integer' })
    .optional(),
});

export interface EnvironmentOptions {
  enabled?: boolean;
  logLevel?: LogLevel;
  historyCapacity?: number;
}

/**
 * Read engine settings from environment variables. Unset or empty
 * variables are left out so the engine defaults apply.
 *
 * @throws EnvironmentConfigError when a variable is set to a value that cannot be parsed.
 */
export function parseEnvironment(env: Record<string, string | undefined> = process.env): EnvironmentOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new EnvironmentConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const { VEILPRINT_ENABLED, VEILPRINT_LOG_LEVEL, VEILPRINT_HISTORY_CAPACITY } = parsed.data;
  const options: EnvironmentOptions = {};
  if (VEILPRINT_ENABLED) options.enabled = !FALSY.has(VEILPRINT_ENABLED);
  if (VEILPRINT_LOG_LEVEL) options.logLevel = parseLogLevel(VEILPRINT_LOG_LEVEL);
  if (VEILPRINT_HISTORY_CAPACITY) options.historyCapacity = Number.parseInt(VEILPRINT_HISTORY_CAPACITY, 10);
  return options;
}

/**
 * `EngineOptions` from the environment: the process switch, the detector
 * history size and a console logger at the requested level (default
 * "info").
 */
export function engineOptionsFromEnv(env: Record<string, string | undefined> = process.env): EngineOptions {
  const parsed = parseEnvironment(env);
  const options: EngineOptions = {
    logger: createLogger('engine', { level: parsed.logLevel ?? 'info' }),
  };
  if (parsed.enabled !== undefined) options.enabled = parsed.enabled;
  if (parsed.historyCapacity !== undefined) options.historyCapacity = parsed.historyCapacity;
  return options;
}

/**
 * Build a fully wired engine. Explicit `options` win over anything read
 * from the environment; pass `env: {}` to ignore the process environment.
 */
export function createEngine(
  options: EngineOptions = {},
  env: Record<string, string | undefined> = process.env,
): FingerprintEngine {
  return new FingerprintEngine({ ...engineOptionsFromEnv(env), ...options });
}
