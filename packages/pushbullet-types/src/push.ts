/**
 * Pushbullet Push Codec
 *
 * Decodes existing pushes (and pages of them) from the JSON the server
 * returns, and encodes new pushes into the JSON body of a create request.
 * New pushes are never decoded and existing pushes are never encoded.
 *
 * @example
 * ```ts
 * import { simpleNewPush, toDevice, notePush, encodeNewPush } from 'pushbullet-types';
 *
 * const body = encodeNewPush(simpleNewPush(toDevice('d1'), notePush('hi')));
 * // { source_device_iden: null, guid: null, device_iden: 'd1', type: 'note', title: null, body: 'hi' }
 * ```
 */

import type {
  ChannelTag,
  ClientId,
  DecodeResult,
  DeviceId,
  EmailAddress,
  ExistingPush,
  ExistingPushes,
  JsonObject,
  NewPush,
  NewPushTarget,
  PushData,
  PushTarget,
} from './types.js';
import { ERROR_MESSAGES, PUSHES_KEY } from './constants.js';
import {
  childPath,
  expectObject,
  fail,
  indexPath,
  optionalField,
  parseJsonText,
  readBoolean,
  requiredField,
  runDecoder,
} from './json.js';
import type { Reader } from './json.js';
import { readDeviceId, readGuid, readPushbulletTime, readPushId } from './values.js';
import { readPushDirection } from './direction.js';
import { encodeNewPushData, readExistingPushData } from './push-data.js';
import { readPushReceiver, readPushSender } from './sender.js';

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

/** Broadcast to all of the user's devices */
export function toAll(): NewPushTarget {
  return { kind: 'all' };
}

export function toDevice(deviceId: DeviceId): NewPushTarget {
  return { kind: 'device', deviceId };
}

export function toEmail(email: EmailAddress): NewPushTarget {
  return { kind: 'email', email };
}

/** Send to every subscriber of the channel with this tag */
export function toChannel(channelTag: ChannelTag): NewPushTarget {
  return { kind: 'channel', channelTag };
}

/** Send to every user who granted access to this OAuth client */
export function toClient(clientId: ClientId): NewPushTarget {
  return { kind: 'client', clientId };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Construct a new push with no source device and no guid.
 *
 * Attach either afterwards with a spread, e.g.
 * `{ ...simpleNewPush(target, data), guid: generateGuid() }`.
 */
export function simpleNewPush(target: PushTarget<'new'>, data: PushData<'new'>): NewPush {
  return {
    data,
    sourceDevice: null,
    target,
    guid: null,
  };
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

export const readExistingPush: Reader<ExistingPush> = (value, path) => {
  const obj = expectObject(value, path, ERROR_MESSAGES.pushNotObject);

  const data = readExistingPushData(obj, path);
  const sender = readPushSender(obj, path);
  const receiver = readPushReceiver(obj, path);
  const sourceDevice = optionalField(obj, 'source_device_iden', readDeviceId, path);
  const targetDevice = optionalField(obj, 'target_device_iden', readDeviceId, path);

  return {
    data,
    sourceDevice,
    target:
      targetDevice === null
        ? { kind: 'broadcast' }
        : { kind: 'sent-to-device', deviceId: targetDevice },
    guid: optionalField(obj, 'guid', readGuid, path),
    id: requiredField(obj, 'iden', readPushId, path),
    active: requiredField(obj, 'active', readBoolean, path),
    created: requiredField(obj, 'created', readPushbulletTime, path),
    modified: requiredField(obj, 'modified', readPushbulletTime, path),
    dismissed: requiredField(obj, 'dismissed', readBoolean, path),
    direction: requiredField(obj, 'direction', readPushDirection, path),
    sender,
    receiver,
  };
};

const readRawArray: Reader<unknown[]> = (value, path) => {
  if (!Array.isArray(value)) {
    fail('malformed-shape', path, `Expected array under "${PUSHES_KEY}"`);
  }
  return value;
};

/** Narrow a page object and return its `pushes` array, elements still undecoded */
export const readPushesArray: Reader<unknown[]> = (value, path) => {
  const obj = expectObject(value, path, ERROR_MESSAGES.pushesNotObject);
  return requiredField(obj, PUSHES_KEY, readRawArray, path);
};

export const readExistingPushes: Reader<ExistingPushes> = (value, path) => {
  const pushesPath = childPath(path, PUSHES_KEY);
  return readPushesArray(value, path).map((item, i) =>
    readExistingPush(item, indexPath(pushesPath, i)),
  );
};

/**
 * Decode an existing push from a parsed JSON value.
 *
 * A push decodes completely or not at all: the first missing key, bad value
 * or unreconstructable sender fails the whole push.
 *
 * @param value - Parsed JSON value.
 * @param path - Path prefix used in error reports.
 */
export function decodeExistingPush(value: unknown, path = ''): DecodeResult<ExistingPush> {
  return runDecoder(() => readExistingPush(value, path));
}

/**
 * Decode one page of pushes from `{"pushes": [...]}`. Any invalid element
 * fails the whole page.
 */
export function decodeExistingPushes(value: unknown): DecodeResult<ExistingPushes> {
  return runDecoder(() => readExistingPushes(value, ''));
}

/** Decode an existing push from a raw response body */
export function parseExistingPush(text: string): DecodeResult<ExistingPush> {
  const parsed = parseJsonText(text);
  return parsed.success ? decodeExistingPush(parsed.value) : parsed;
}

/** Decode a page of pushes from a raw response body */
export function parseExistingPushes(text: string): DecodeResult<ExistingPushes> {
  const parsed = parseJsonText(text);
  return parsed.success ? decodeExistingPushes(parsed.value) : parsed;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

function encodeNewPushTarget(target: NewPushTarget): JsonObject {
  switch (target.kind) {
    case 'all':
      return {};
    case 'device':
      return { device_iden: target.deviceId };
    case 'email':
      return { email: target.email };
    case 'channel':
      return { channel_tag: target.channelTag };
    case 'client':
      return { client_iden: target.clientId };
  }
}

/**
 * Encode a new push as the JSON body of a create request.
 *
 * `source_device_iden` and `guid` are always written, as `null` when unset.
 * The target contributes at most one key.
 */
export function encodeNewPush(push: NewPush): JsonObject {
  return {
    source_device_iden: push.sourceDevice,
    guid: push.guid,
    ...encodeNewPushTarget(push.target),
    ...encodeNewPushData(push.data),
  };
}
