/**
 * pushbullet-types: Pushbullet push model and JSON codec
 *
 * Models a push in its two lifecycle phases (new and existing) and converts
 * between those models and the Pushbullet wire format.
 *
 * @example
 * ```ts
 * import {
 *   simpleNewPush,
 *   toDevice,
 *   notePush,
 *   encodeNewPush,
 *   parseExistingPushes,
 * } from 'pushbullet-types';
 *
 * // Build a request body
 * const body = encodeNewPush(simpleNewPush(toDevice('ujpah72o0sjAoRtnM0jc'), notePush('Back in 5')));
 *
 * // Read a response
 * const page = parseExistingPushes(responseText);
 * if (page.success) {
 *   for (const push of page.value) console.log(push.id, push.sender.name);
 * } else {
 *   console.error(page.error.path, page.error.message);
 * }
 * ```
 */

// Types
export type {
  DeviceId,
  UserId,
  ChannelId,
  ChannelTag,
  ClientId,
  EmailAddress,
  Url,
  MimeType,
  Name,
  Guid,
  PushId,
  PushbulletTime,
  PushPhase,
  PushType,
  PushDirection,
  NewPushTarget,
  ExistingPushTarget,
  PushTarget,
  NotePushData,
  LinkPushData,
  NewFilePushData,
  ExistingFilePushData,
  FilePushData,
  PushData,
  UserPushSender,
  ChannelPushSender,
  PushSender,
  PushReceiver,
  PushCommon,
  ExistingPushOnlyKey,
  NewPush,
  ExistingPush,
  Push,
  ExistingPushes,
  JsonPrimitive,
  JsonValue,
  JsonObject,
  DecodeErrorKind,
  DecodeError,
  DecodeSuccess,
  DecodeFailureResult,
  DecodeResult,
} from './types.js';

// Push construction and codec
export {
  toAll,
  toDevice,
  toEmail,
  toChannel,
  toClient,
  simpleNewPush,
  decodeExistingPush,
  decodeExistingPushes,
  parseExistingPush,
  parseExistingPushes,
  encodeNewPush,
} from './push.js';

export { notePush, linkPush, filePush } from './push-data.js';
export { decodePushDirection, encodePushDirection } from './direction.js';
export { generateGuid, pushIdToUrlPiece } from './ids.js';
export { pushbulletTimeToDate, dateToPushbulletTime } from './values.js';

// Service
export { PushCodec } from './codec.js';
export type { DecodedPushPage, SkippedPush } from './codec.js';

// Configuration and logging
export { loadConfig, DEFAULT_PUSH_CODEC_CONFIG } from './config.js';
export type { Config, PushCodecConfig, InvalidPushPolicy } from './config.js';
export { createLogger } from './logger.js';

// Constants
export {
  PUSH_TYPES,
  PUSH_DIRECTIONS,
  PUSHES_KEY,
  INVALID_PUSH_POLICIES,
  ERROR_MESSAGES,
} from './constants.js';
