/**
 * Push identifiers
 *
 * Guid generation for outgoing pushes and PushId coercion for request paths.
 */

import { randomBytes } from 'node:crypto';
import type { Guid, PushId } from './types.js';

/**
 * Generate an idempotency token for a new push.
 *
 * @returns 32 lowercase hex characters (e.g. `9f86d081884c7d659a2feaa0c55ad015`).
 */
export function generateGuid(): Guid {
  return randomBytes(16).toString('hex');
}

/**
 * Render a push id as a URL path segment, e.g. for `/v2/pushes/{iden}`.
 * The id is returned unchanged; escaping the segment is left to whatever
 * builds the request URL, so callers must not encode the result again.
 */
export function pushIdToUrlPiece(id: PushId): string {
  return id;
}
