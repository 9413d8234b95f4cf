/**
 * Push contents codec.
 *
 * Contents are discriminated by the `type` key. Only existing contents are
 * ever decoded and only new contents are ever encoded.
 */

import type {
  ExistingFilePushData,
  JsonObject,
  LinkPushData,
  MimeType,
  NewFilePushData,
  NotePushData,
  PushData,
  Url,
} from './types.js';
import { ERROR_MESSAGES } from './constants.js';
import { childPath, fail, optionalField, readString, requiredField } from './json.js';
import { readDimension, readMimeType, readUrl } from './values.js';

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function notePush(body: string, title: string | null = null): NotePushData {
  return { type: 'note', title, body };
}

export function linkPush(
  url: Url,
  title: string | null = null,
  body: string | null = null,
): LinkPushData {
  return { type: 'link', title, body, url };
}

export function filePush(input: {
  fileName: string;
  fileType: MimeType;
  fileUrl: Url;
  title?: string | null;
  body?: string | null;
}): NewFilePushData {
  return {
    type: 'file',
    title: input.title ?? null,
    body: input.body ?? null,
    fileName: input.fileName,
    fileType: input.fileType,
    fileUrl: input.fileUrl,
  };
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/**
 * Read the contents of an existing push from its (already narrowed) object.
 * Note and link read their title from `title`; file reads it from `file_title`.
 */
export function readExistingPushData(
  obj: Record<string, unknown>,
  path: string,
): PushData<'existing'> {
  const pushType = requiredField(obj, 'type', readString, path);

  switch (pushType) {
    case 'note':
      return {
        type: 'note',
        title: optionalField(obj, 'title', readString, path),
        body: requiredField(obj, 'body', readString, path),
      };

    case 'link':
      return {
        type: 'link',
        title: optionalField(obj, 'title', readString, path),
        body: optionalField(obj, 'body', readString, path),
        url: requiredField(obj, 'url', readUrl, path),
      };

    case 'file': {
      const file: ExistingFilePushData = {
        type: 'file',
        title: optionalField(obj, 'file_title', readString, path),
        body: optionalField(obj, 'body', readString, path),
        fileName: requiredField(obj, 'file_name', readString, path),
        fileType: requiredField(obj, 'file_type', readMimeType, path),
        fileUrl: requiredField(obj, 'file_url', readUrl, path),
        imageUrl: optionalField(obj, 'image_url', readUrl, path),
        imageWidth: optionalField(obj, 'image_width', readDimension, path),
        imageHeight: optionalField(obj, 'image_height', readDimension, path),
      };
      return file;
    }

    default:
      return fail(
        'unrecognized-value',
        childPath(path, 'type'),
        `${ERROR_MESSAGES.unrecognizedPushType}: "${pushType}"`,
      );
  }
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/**
 * Encode the contents of a new push.
 *
 * File contents carry no `title` key on the wire, although
 * `NewFilePushData` has a title.
 */
export function encodeNewPushData(data: PushData<'new'>): JsonObject {
  switch (data.type) {
    case 'note':
      return {
        type: 'note',
        title: data.title,
        body: data.body,
      };

    case 'link':
      return {
        type: 'link',
        title: data.title,
        body: data.body,
        url: data.url,
      };

    case 'file':
      return {
        type: 'file',
        body: data.body,
        file_name: data.fileName,
        file_type: data.fileType,
        file_url: data.fileUrl,
      };
  }
}
