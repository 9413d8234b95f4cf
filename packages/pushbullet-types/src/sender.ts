/**
 * Sender and receiver reconstruction.
 *
 * Neither appears as a nested object on the wire. Both are rebuilt from flat,
 * individually optional keys on the push object.
 */

import type {
  ChannelPushSender,
  PushReceiver,
  PushSender,
  UserPushSender,
} from './types.js';
import { ERROR_MESSAGES } from './constants.js';
import { fail, optionalField } from './json.js';
import {
  readChannelId,
  readClientId,
  readEmailAddress,
  readName,
  readUserId,
} from './values.js';

/** Flat sender keys as they appear on a push object */
interface SenderFields {
  clientIden: string | null;
  channelIden: string | null;
  senderEmail: string | null;
  senderEmailNormalized: string | null;
  senderIden: string | null;
  senderName: string | null;
}

function readSenderFields(obj: Record<string, unknown>, path: string): SenderFields {
  return {
    clientIden: optionalField(obj, 'client_iden', readClientId, path),
    channelIden: optionalField(obj, 'channel_iden', readChannelId, path),
    senderEmail: optionalField(obj, 'sender_email', readEmailAddress, path),
    senderEmailNormalized: optionalField(obj, 'sender_email_normalized', readEmailAddress, path),
    senderIden: optionalField(obj, 'sender_iden', readUserId, path),
    senderName: optionalField(obj, 'sender_name', readName, path),
  };
}

/** Succeeds only when the user id, both emails and the name are all present */
function reconstructUserSender(f: SenderFields): UserPushSender | null {
  if (
    f.senderIden === null ||
    f.senderEmail === null ||
    f.senderEmailNormalized === null ||
    f.senderName === null
  ) {
    return null;
  }
  return {
    kind: 'user',
    userId: f.senderIden,
    clientId: f.clientIden,
    email: f.senderEmail,
    emailNormalized: f.senderEmailNormalized,
    name: f.senderName,
  };
}

/** Succeeds only when the channel id and the name are present */
function reconstructChannelSender(f: SenderFields): ChannelPushSender | null {
  if (f.channelIden === null || f.senderName === null) {
    return null;
  }
  return { kind: 'channel', channelId: f.channelIden, name: f.senderName };
}

/**
 * Rebuild the sender of an existing push.
 *
 * User reconstruction is tried first and wins when both would succeed; a
 * well-formed payload only ever satisfies one of them. Fails with an
 * `unreconstructable-sender` error when neither does.
 */
export function readPushSender(obj: Record<string, unknown>, path: string): PushSender {
  const fields = readSenderFields(obj, path);

  const sender = reconstructUserSender(fields) ?? reconstructChannelSender(fields);
  if (sender === null) {
    fail('unreconstructable-sender', path, ERROR_MESSAGES.senderNotReconstructable);
  }
  return sender;
}

/**
 * Rebuild the receiver of an existing push. Returns `null` unless all three
 * receiver keys are present; partial presence is not an error.
 */
export function readPushReceiver(
  obj: Record<string, unknown>,
  path: string,
): PushReceiver | null {
  const userId = optionalField(obj, 'receiver_iden', readUserId, path);
  const email = optionalField(obj, 'receiver_email', readEmailAddress, path);
  const emailNormalized = optionalField(obj, 'receiver_email_normalized', readEmailAddress, path);

  if (userId === null || email === null || emailNormalized === null) {
    return null;
  }
  return { userId, email, emailNormalized };
}
