/**
 * Pushbullet Push Constants
 *
 * Wire discriminators, enum strings and decode error messages shared by
 * the push codecs.
 */

/** Values of the `type` discriminator on a push object */
export const PUSH_TYPES = ['note', 'link', 'file'] as const;

/** Wire strings for the direction of an existing push */
export const PUSH_DIRECTIONS = ['self', 'outgoing', 'incoming'] as const;

/** Key wrapping the array returned by the list-pushes endpoint */
export const PUSHES_KEY = 'pushes';

/** Policies for invalid elements while decoding a page of pushes */
export const INVALID_PUSH_POLICIES = ['fail', 'skip'] as const;

/** Decode error messages */
export const ERROR_MESSAGES = {
  unrecognizedPushType: 'unrecognized push type',
  invalidDirection: 'invalid direction string',
  directionNotString: 'cannot parse push direction from non-string',
  senderNotReconstructable: 'push not sent by channel or by user',
  pushNotObject: 'cannot parse push from non-object',
  pushesNotObject: 'cannot parse existing pushes from non-object',
} as const;
