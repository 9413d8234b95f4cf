/**
 * Push direction codec.
 *
 * The wire strings are exactly `self`, `outgoing` and `incoming`; matching
 * is case-sensitive.
 */

import type { DecodeResult, PushDirection } from './types.js';
import { ERROR_MESSAGES, PUSH_DIRECTIONS } from './constants.js';
import { fail, runDecoder } from './json.js';
import type { Reader } from './json.js';

function isPushDirection(value: string): value is PushDirection {
  return (PUSH_DIRECTIONS as readonly string[]).includes(value);
}

export const readPushDirection: Reader<PushDirection> = (value, path) => {
  if (typeof value !== 'string') {
    fail('invalid-value', path, ERROR_MESSAGES.directionNotString);
  }
  if (!isPushDirection(value)) {
    fail('unrecognized-value', path, `${ERROR_MESSAGES.invalidDirection}: "${value}"`);
  }
  return value;
};

/**
 * Decode a push direction from a JSON value.
 *
 * @param value - Parsed JSON value; anything but one of the three wire strings fails.
 */
export function decodePushDirection(value: unknown): DecodeResult<PushDirection> {
  return runDecoder(() => readPushDirection(value, ''));
}

export function encodePushDirection(direction: PushDirection): string {
  return direction;
}
