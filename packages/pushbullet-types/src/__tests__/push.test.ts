import { describe, it, expect } from 'vitest';
import {
  decodeExistingPush,
  parseExistingPush,
} from '../push.js';
import { encodePushDirection } from '../direction.js';
import { makeFilePushJson, makeLinkPushJson, makeNotePushJson, without } from './fixtures.js';

describe('decodeExistingPush', () => {
  it('should decode a note push field-for-field', () => {
    const result = decodeExistingPush(makeNotePushJson());

    expect(result).toEqual({
      success: true,
      value: {
        data: { type: 'note', title: 'Groceries', body: 'Milk and eggs' },
        sourceDevice: 'device-laptop',
        target: { kind: 'sent-to-device', deviceId: 'device-phone' },
        guid: null,
        id: 'push-note-001',
        active: true,
        created: 1700000000.5,
        modified: 1700000001.25,
        dismissed: false,
        direction: 'self',
        sender: {
          kind: 'user',
          userId: 'user-001',
          clientId: null,
          email: 'Alice@Example.com',
          emailNormalized: 'alice@example.com',
          name: 'Alice',
        },
        receiver: {
          userId: 'user-001',
          email: 'Alice@Example.com',
          emailNormalized: 'alice@example.com',
        },
      },
    });
  });

  it('should decode a channel link push with a broadcast target', () => {
    const result = decodeExistingPush(makeLinkPushJson());
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.data).toEqual({
        type: 'link',
        title: 'v2 is out',
        body: null,
        url: 'https://example.com/releases/v2',
      });
      expect(result.value.target).toEqual({ kind: 'broadcast' });
      expect(result.value.sender).toEqual({
        kind: 'channel',
        channelId: 'channel-007',
        name: 'Release Notes',
      });
      expect(result.value.receiver).toBeNull();
      expect(result.value.sourceDevice).toBeNull();
    }
  });

  it('should reproduce the wire discriminators from decoded values', () => {
    for (const fixture of [makeNotePushJson(), makeLinkPushJson(), makeFilePushJson()]) {
      const result = decodeExistingPush(fixture);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.value.data.type).toBe(fixture['type']);
        expect(encodePushDirection(result.value.direction)).toBe(fixture['direction']);
      }
    }
  });

  it('should read the guid when present', () => {
    const result = decodeExistingPush(makeNotePushJson({ guid: 'guid-abc' }));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.guid).toBe('guid-abc');
    }
  });

  it('should treat null optional keys as absent', () => {
    const result = decodeExistingPush(
      makeNotePushJson({ title: null, target_device_iden: null, source_device_iden: null }),
    );
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.data).toEqual({ type: 'note', title: null, body: 'Milk and eggs' });
      expect(result.value.target).toEqual({ kind: 'broadcast' });
      expect(result.value.sourceDevice).toBeNull();
    }
  });

  it('should fail on non-object input', () => {
    for (const value of [[], 'push', 42, null]) {
      expect(decodeExistingPush(value)).toEqual({
        success: false,
        error: {
          kind: 'malformed-shape',
          path: '',
          message: 'cannot parse push from non-object',
        },
      });
    }
  });

  it.each(['iden', 'active', 'created', 'modified', 'dismissed', 'direction'])(
    'should fail when "%s" is missing',
    (key) => {
      const result = decodeExistingPush(without(makeNotePushJson(), key));
      expect(result).toEqual({
        success: false,
        error: { kind: 'missing-field', path: key, message: `Missing required field: ${key}` },
      });
    },
  );

  it('should treat a null mandatory key as missing', () => {
    const result = decodeExistingPush(makeNotePushJson({ iden: null }));
    expect(result).toEqual({
      success: false,
      error: { kind: 'missing-field', path: 'iden', message: 'Missing required field: iden' },
    });
  });

  it('should fail on a wrongly typed field', () => {
    const result = decodeExistingPush(makeNotePushJson({ created: 'yesterday' }));
    expect(result).toEqual({
      success: false,
      error: { kind: 'invalid-value', path: 'created', message: 'Expected number, got string' },
    });
  });

  it('should fail on an unknown direction', () => {
    const result = decodeExistingPush(makeNotePushJson({ direction: 'unknown' }));
    expect(result).toEqual({
      success: false,
      error: {
        kind: 'unrecognized-value',
        path: 'direction',
        message: 'invalid direction string: "unknown"',
      },
    });
  });

  it('should report the source device before the target device', () => {
    const result = decodeExistingPush(
      makeNotePushJson({ source_device_iden: 5, target_device_iden: 6 }),
    );
    expect(result).toEqual({
      success: false,
      error: {
        kind: 'invalid-value',
        path: 'source_device_iden',
        message: 'Expected string, got number',
      },
    });
  });

  it('should prefix error paths', () => {
    const result = decodeExistingPush(without(makeNotePushJson(), 'iden'), 'items[4]');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.path).toBe('items[4].iden');
    }
  });
});

describe('parseExistingPush', () => {
  it('should decode a push from response text', () => {
    const result = parseExistingPush(JSON.stringify(makeNotePushJson()));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.id).toBe('push-note-001');
    }
  });

  it('should report invalid JSON', () => {
    const result = parseExistingPush('{"iden": ');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('invalid-json');
      expect(result.error.path).toBe('');
      expect(result.error.message).toMatch(/^Invalid JSON: /);
    }
  });
});
