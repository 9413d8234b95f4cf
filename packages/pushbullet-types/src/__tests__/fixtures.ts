/**
 * Wire-format push objects shared by the codec tests.
 */

type JsonFields = Record<string, unknown>;

/** A note push sent by a user to one of their own devices */
export function makeNotePushJson(overrides: JsonFields = {}): JsonFields {
  return {
    active: true,
    iden: 'push-note-001',
    created: 1700000000.5,
    modified: 1700000001.25,
    type: 'note',
    dismissed: false,
    direction: 'self',
    sender_iden: 'user-001',
    sender_email: 'Alice@Example.com',
    sender_email_normalized: 'alice@example.com',
    sender_name: 'Alice',
    receiver_iden: 'user-001',
    receiver_email: 'Alice@Example.com',
    receiver_email_normalized: 'alice@example.com',
    target_device_iden: 'device-phone',
    source_device_iden: 'device-laptop',
    title: 'Groceries',
    body: 'Milk and eggs',
    ...overrides,
  };
}

/** A link push broadcast by a channel */
export function makeLinkPushJson(overrides: JsonFields = {}): JsonFields {
  return {
    active: true,
    iden: 'push-link-002',
    created: 1700000100,
    modified: 1700000100,
    type: 'link',
    dismissed: false,
    direction: 'incoming',
    channel_iden: 'channel-007',
    sender_name: 'Release Notes',
    title: 'v2 is out',
    url: 'https://example.com/releases/v2',
    ...overrides,
  };
}

/** A file push with thumbnail metadata */
export function makeFilePushJson(overrides: JsonFields = {}): JsonFields {
  return {
    active: true,
    iden: 'push-file-003',
    created: 1700000200,
    modified: 1700000250,
    type: 'file',
    dismissed: true,
    direction: 'outgoing',
    sender_iden: 'user-001',
    sender_email: 'Alice@Example.com',
    sender_email_normalized: 'alice@example.com',
    sender_name: 'Alice',
    client_iden: 'client-cli',
    file_title: 'Holiday photo',
    body: 'From the beach',
    file_name: 'beach.jpg',
    file_type: 'image/jpeg',
    file_url: 'https://files.example.com/beach.jpg',
    image_url: 'https://files.example.com/beach-thumb.jpg',
    image_width: 640,
    image_height: 480,
    ...overrides,
  };
}

/** Copy of `obj` without the given keys */
export function without(obj: JsonFields, ...keys: string[]): JsonFields {
  const copy = { ...obj };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}
