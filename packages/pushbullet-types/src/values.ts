/**
 * Codecs for the opaque values a push refers to.
 *
 * Identifiers, addresses, URLs and MIME types travel as JSON strings and are
 * kept as-is. Times are fractional seconds since the Unix epoch.
 */

import type {
  ChannelId,
  ChannelTag,
  ClientId,
  DeviceId,
  EmailAddress,
  Guid,
  MimeType,
  Name,
  PushbulletTime,
  PushId,
  Url,
  UserId,
} from './types.js';
import { readInteger, readNumber, readString } from './json.js';
import type { Reader } from './json.js';

export const readPushId: Reader<PushId> = readString;
export const readDeviceId: Reader<DeviceId> = readString;
export const readUserId: Reader<UserId> = readString;
export const readChannelId: Reader<ChannelId> = readString;
export const readChannelTag: Reader<ChannelTag> = readString;
export const readClientId: Reader<ClientId> = readString;
export const readEmailAddress: Reader<EmailAddress> = readString;
export const readUrl: Reader<Url> = readString;
export const readMimeType: Reader<MimeType> = readString;
export const readName: Reader<Name> = readString;
export const readGuid: Reader<Guid> = readString;
export const readPushbulletTime: Reader<PushbulletTime> = readNumber;

/** Image dimensions are whole pixels */
export const readDimension: Reader<number> = readInteger;

export function pushbulletTimeToDate(time: PushbulletTime): Date {
  return new Date(Math.round(time * 1000));
}

export function dateToPushbulletTime(date: Date): PushbulletTime {
  return date.getTime() / 1000;
}
