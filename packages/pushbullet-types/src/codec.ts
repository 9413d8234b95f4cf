/**
 * Push codec service.
 *
 * Wraps the pure decode/encode functions with structured logging and applies
 * the configured policy for invalid elements in a page of pushes.
 */

import type { Logger } from 'pino';
import type {
  DecodeError,
  DecodeResult,
  ExistingPush,
  ExistingPushes,
  JsonObject,
  NewPush,
} from './types.js';
import { PUSHES_KEY } from './constants.js';
import { indexPath, parseJsonText, runDecoder } from './json.js';
import { decodeExistingPush, decodeExistingPushes, encodeNewPush, readPushesArray } from './push.js';
import type { PushCodecConfig } from './config.js';
import { DEFAULT_PUSH_CODEC_CONFIG } from './config.js';

/** An element dropped from a page under the `skip` policy */
export interface SkippedPush {
  index: number;
  error: DecodeError;
}

/** A decoded page of pushes */
export interface DecodedPushPage {
  pushes: ExistingPushes;

  /** Always empty under the `fail` policy */
  skipped: SkippedPush[];
}

export class PushCodec {
  private readonly config: PushCodecConfig;
  private readonly logger: Logger;

  constructor(logger: Logger, config?: Partial<PushCodecConfig>) {
    this.config = { ...DEFAULT_PUSH_CODEC_CONFIG, ...config };
    this.logger = logger.child({ component: 'push-codec' });
  }

  /**
   * Decode a single existing push.
   */
  decodePush(value: unknown): DecodeResult<ExistingPush> {
    const result = decodeExistingPush(value);
    if (result.success) {
      this.logger.debug({ pushId: result.value.id, type: result.value.data.type }, 'Decoded push');
    } else {
      this.logger.warn({ error: result.error }, 'Failed to decode push');
    }
    return result;
  }

  /**
   * Decode a page of pushes from `{"pushes": [...]}`.
   *
   * Under `fail` the first invalid element fails the page. Under `skip`
   * invalid elements are dropped and listed in `skipped`; a page that is not
   * an object, or lacks the `pushes` array, still fails.
   */
  decodePushes(value: unknown): DecodeResult<DecodedPushPage> {
    if (this.config.invalidPushes === 'fail') {
      const result = decodeExistingPushes(value);
      if (!result.success) {
        this.logger.warn({ error: result.error }, 'Failed to decode push page');
        return result;
      }
      this.logger.debug({ count: result.value.length }, 'Decoded push page');
      return { success: true, value: { pushes: result.value, skipped: [] } };
    }

    const items = runDecoder(() => readPushesArray(value, ''));
    if (!items.success) {
      this.logger.warn({ error: items.error }, 'Failed to decode push page');
      return items;
    }

    const pushes: ExistingPush[] = [];
    const skipped: SkippedPush[] = [];

    items.value.forEach((item, index) => {
      const result = decodeExistingPush(item, indexPath(PUSHES_KEY, index));
      if (result.success) {
        pushes.push(result.value);
      } else {
        this.logger.warn({ index, error: result.error }, 'Skipping invalid push');
        skipped.push({ index, error: result.error });
      }
    });

    this.logger.debug(
      { count: pushes.length, skipped: skipped.length },
      'Decoded push page',
    );

    return { success: true, value: { pushes, skipped } };
  }

  /** Decode a page of pushes from a raw response body */
  parsePushes(text: string): DecodeResult<DecodedPushPage> {
    const parsed = parseJsonText(text);
    if (!parsed.success) {
      this.logger.warn({ error: parsed.error }, 'Push page is not valid JSON');
      return parsed;
    }
    return this.decodePushes(parsed.value);
  }

  /**
   * Encode a new push as the body of a create request.
   */
  encodePush(push: NewPush): JsonObject {
    const body = encodeNewPush(push);
    this.logger.debug({ type: push.data.type, target: push.target.kind }, 'Encoded push');
    return body;
  }
}
