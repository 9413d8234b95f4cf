/**
 * Environment-derived configuration.
 */

import { INVALID_PUSH_POLICIES } from './constants.js';

/** How a page decode treats an element that fails to decode */
export type InvalidPushPolicy = (typeof INVALID_PUSH_POLICIES)[number];

export interface PushCodecConfig {
  /** `fail` aborts the whole page; `skip` drops the element and reports it */
  invalidPushes: InvalidPushPolicy;
}

export interface Config extends PushCodecConfig {
  nodeEnv: string;
  logLevel: string;
}

export const DEFAULT_PUSH_CODEC_CONFIG: PushCodecConfig = {
  invalidPushes: 'fail',
};

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function isInvalidPushPolicy(value: string): value is InvalidPushPolicy {
  return (INVALID_PUSH_POLICIES as readonly string[]).includes(value);
}

/**
 * Load configuration from the environment. Unrecognised values fall back to
 * the defaults.
 */
export function loadConfig(env: Env = process.env): Config {
  const invalidPushes = getEnv(env, 'PUSH_CODEC_INVALID_PUSHES', DEFAULT_PUSH_CODEC_CONFIG.invalidPushes);

  return {
    nodeEnv: getEnv(env, 'NODE_ENV', 'development'),
    logLevel: getEnv(env, 'LOG_LEVEL', 'info'),
    invalidPushes: isInvalidPushPolicy(invalidPushes)
      ? invalidPushes
      : DEFAULT_PUSH_CODEC_CONFIG.invalidPushes,
  };
}
