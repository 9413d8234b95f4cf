/**
 * Pushbullet Push Types
 *
 * A push is modelled in two phases. A new push is authored by the client and
 * has not been submitted yet. An existing push has been confirmed by the
 * server and carries server-assigned metadata. Both phases share
 * `PushCommon`; only `ExistingPush` gives the server-only fields a type other
 * than `never`.
 */

import type { PUSH_DIRECTIONS, PUSH_TYPES } from './constants.js';

// ---------------------------------------------------------------------------
// Opaque values
// ---------------------------------------------------------------------------

/** Device identifier (`iden` of a device) */
export type DeviceId = string;

/** User identifier */
export type UserId = string;

/** Channel identifier */
export type ChannelId = string;

/** Channel tag used to address subscribers of a channel */
export type ChannelTag = string;

/** OAuth client identifier */
export type ClientId = string;

export type EmailAddress = string;

export type Url = string;

export type MimeType = string;

/** Display name of a user or channel */
export type Name = string;

/** Client-supplied idempotency token */
export type Guid = string;

/** Unique identifier for a push */
export type PushId = string;

/** Server timestamp: fractional seconds since the Unix epoch */
export type PushbulletTime = number;

// ---------------------------------------------------------------------------
// Phase
// ---------------------------------------------------------------------------

/** Lifecycle phase of a push */
export type PushPhase = 'new' | 'existing';

/** One of the push content discriminators */
export type PushType = (typeof PUSH_TYPES)[number];

/** Direction of an existing push relative to the current user */
export type PushDirection = (typeof PUSH_DIRECTIONS)[number];

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

/** Addressing modes available when creating a push */
export type NewPushTarget =
  | { readonly kind: 'all' }
  | { readonly kind: 'device'; readonly deviceId: DeviceId }
  | { readonly kind: 'email'; readonly email: EmailAddress }
  | { readonly kind: 'channel'; readonly channelTag: ChannelTag }
  | { readonly kind: 'client'; readonly clientId: ClientId };

/**
 * Target as reported by the server. The richer addressing modes collapse to
 * either "no specific device" or a single device.
 */
export type ExistingPushTarget =
  | { readonly kind: 'broadcast' }
  | { readonly kind: 'sent-to-device'; readonly deviceId: DeviceId };

export type PushTarget<S extends PushPhase = PushPhase> = S extends 'new'
  ? NewPushTarget
  : ExistingPushTarget;

// ---------------------------------------------------------------------------
// Contents
// ---------------------------------------------------------------------------

export interface NotePushData {
  readonly type: 'note';
  readonly title: string | null;
  readonly body: string;
}

export interface LinkPushData {
  readonly type: 'link';
  readonly title: string | null;
  readonly body: string | null;
  readonly url: Url;
}

interface FilePushFields {
  readonly type: 'file';
  readonly title: string | null;
  readonly body: string | null;
  readonly fileName: string;
  readonly fileType: MimeType;
  readonly fileUrl: Url;
}

/** File contents as known when the push is created; no thumbnail metadata */
export interface NewFilePushData extends FilePushFields {
  readonly imageUrl?: never;
  readonly imageWidth?: never;
  readonly imageHeight?: never;
}

/** File contents with the thumbnail metadata the server derives */
export interface ExistingFilePushData extends FilePushFields {
  readonly imageUrl: Url | null;
  readonly imageWidth: number | null;
  readonly imageHeight: number | null;
}

export type FilePushData<S extends PushPhase = PushPhase> = S extends 'new'
  ? NewFilePushData
  : ExistingFilePushData;

/** The actual contents of a push */
export type PushData<S extends PushPhase = PushPhase> =
  | NotePushData
  | LinkPushData
  | FilePushData<S>;

// ---------------------------------------------------------------------------
// Sender / receiver
// ---------------------------------------------------------------------------

export interface UserPushSender {
  readonly kind: 'user';
  readonly userId: UserId;
  readonly clientId: ClientId | null;
  readonly email: EmailAddress;
  readonly emailNormalized: EmailAddress;
  readonly name: Name;
}

export interface ChannelPushSender {
  readonly kind: 'channel';
  readonly channelId: ChannelId;
  readonly name: Name;
}

/** Originator of an existing push */
export type PushSender = UserPushSender | ChannelPushSender;

/** Receiving user of an existing push */
export interface PushReceiver {
  readonly userId: UserId;
  readonly email: EmailAddress;
  readonly emailNormalized: EmailAddress;
}

// ---------------------------------------------------------------------------
// Push
// ---------------------------------------------------------------------------

/**
 * Fields present in both phases. `PushCommon` with the default parameter is
 * the read-only view shared by new and existing pushes.
 */
export interface PushCommon<S extends PushPhase = PushPhase> {
  readonly data: PushData<S>;
  readonly sourceDevice: DeviceId | null;
  readonly target: PushTarget<S>;
  readonly guid: Guid | null;
}

/** A push confirmed by the server */
export interface ExistingPush extends PushCommon<'existing'> {
  readonly id: PushId;
  readonly active: boolean;
  readonly created: PushbulletTime;
  readonly modified: PushbulletTime;
  readonly dismissed: boolean;
  readonly direction: PushDirection;
  readonly sender: PushSender;
  readonly receiver: PushReceiver | null;
}

/** Keys only a server-confirmed push carries */
export type ExistingPushOnlyKey = Exclude<keyof ExistingPush, keyof PushCommon>;

/**
 * A push about to be submitted. The server-only keys are typed `never`, so a
 * value carrying any of them is not assignable to `NewPush`.
 */
export type NewPush = PushCommon<'new'> & {
  readonly [K in ExistingPushOnlyKey]?: never;
};

export type Push<S extends PushPhase> = S extends 'new' ? NewPush : ExistingPush;

/** One page of server results */
export type ExistingPushes = readonly ExistingPush[];

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Decode results
// ---------------------------------------------------------------------------

/** Categories of decode failure */
export type DecodeErrorKind =
  | 'invalid-json'
  | 'malformed-shape'
  | 'missing-field'
  | 'invalid-value'
  | 'unrecognized-value'
  | 'unreconstructable-sender';

export interface DecodeError {
  kind: DecodeErrorKind;

  /** JSON path to the offending value, e.g. `pushes[2].direction` ('' for the root) */
  path: string;

  /** Human-readable description */
  message: string;
}

export interface DecodeSuccess<T> {
  success: true;
  value: T;
}

export interface DecodeFailureResult {
  success: false;
  error: DecodeError;
}

/** Result of decoding a JSON value. Decoders never throw. */
export type DecodeResult<T> = DecodeSuccess<T> | DecodeFailureResult;
