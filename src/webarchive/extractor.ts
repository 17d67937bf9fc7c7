import { Buffer } from 'node:buffer';

import { FormatError } from '../errors/conversion-errors.js';
import type { PlistDict, PlistValue } from '../plist/types.js';
import type { WebArchiveResource } from './types.js';

export const WEBARCHIVE_KEYS = {
  mainResource: 'WebMainResource',
  legacyMainResource: 'MainResource',
  data: 'WebResourceData',
  mimeType: 'WebResourceMIMEType',
  textEncoding: 'WebResourceTextEncodingName',
  url: 'WebResourceURL',
} as const;

const DEFAULT_TEXT_ENCODING = 'UTF-8';
const DEFAULT_MIME_TYPE = 'text/html';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

function fail(message: string): never {
  throw new FormatError(message, 'webarchive');
}

function readString(dict: PlistDict, key: string): string | undefined {
  const value = dict.get(key);
  return value?.kind === 'string' ? value.value : undefined;
}

function resolveMainResource(root: PlistValue): PlistDict {
  if (root.kind !== 'dict') {
    fail(`Archive root is a ${root.kind}, expected a dictionary`);
  }

  const main =
    root.value.get(WEBARCHIVE_KEYS.mainResource) ??
    root.value.get(WEBARCHIVE_KEYS.legacyMainResource);
  if (!main) fail('Webarchive missing main content');
  if (main.kind !== 'dict') {
    fail(`Main resource is a ${main.kind}, expected a dictionary`);
  }
  return main.value;
}

function startsWithMarkup(text: string): boolean {
  return text.trimStart().startsWith('<');
}

function isMarkupMimeType(mimeType: string | undefined): boolean {
  return mimeType === undefined || /html|xml/i.test(mimeType);
}

/**
 * Base64 framing only shows up when an archive was round-tripped through a
 * text plist; binary archives store the document bytes as-is. A decode is
 * kept only when it yields markup for a markup resource.
 */
function decodeIfBase64(
  text: string,
  mimeType: string | undefined
): Uint8Array | undefined {
  if (!isMarkupMimeType(mimeType) || startsWithMarkup(text)) return undefined;
  const compact = text.replace(/[\r\n]+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0) return undefined;
  if (!BASE64_PATTERN.test(compact)) return undefined;

  const decoded = Buffer.from(compact, 'base64');
  if (!startsWithMarkup(decoded.subarray(0, 1024).toString('latin1'))) {
    return undefined;
  }
  return new Uint8Array(decoded);
}

function looksLikeAsciiText(bytes: Uint8Array): boolean {
  return bytes.every((byte) => byte >= 0x09 && byte < 0x7f);
}

function readPayload(
  value: PlistValue,
  mimeType: string | undefined
): Uint8Array {
  if (value.kind === 'data') {
    const bytes = value.value;
    if (!looksLikeAsciiText(bytes)) return bytes;
    const text = Buffer.from(bytes).toString('latin1');
    return decodeIfBase64(text, mimeType) ?? bytes;
  }

  if (value.kind === 'string') {
    return (
      decodeIfBase64(value.value, mimeType) ??
      new Uint8Array(Buffer.from(value.value, 'utf8'))
    );
  }

  return fail(`Main resource data is a ${value.kind}, expected data`);
}

function readMimeType(dict: PlistDict): string | undefined {
  const mimeType = readString(dict, WEBARCHIVE_KEYS.mimeType)?.trim();
  return mimeType ? mimeType.toLowerCase() : undefined;
}

function resolveMimeType(
  declared: string | undefined,
  data: Uint8Array
): string {
  if (declared) return declared;

  const head = Buffer.from(data.subarray(0, 1024)).toString('latin1');
  if (startsWithMarkup(head)) return DEFAULT_MIME_TYPE;
  return fail('Main resource has no MIME type and does not look like HTML');
}

/**
 * Pulls the main document out of a decoded webarchive. Subresources and
 * subframe archives are never visited.
 */
export function extractMainResource(root: PlistValue): WebArchiveResource {
  const main = resolveMainResource(root);

  const rawData = main.get(WEBARCHIVE_KEYS.data);
  if (!rawData) fail('Webarchive missing main content');

  const declaredMimeType = readMimeType(main);
  const data = readPayload(rawData, declaredMimeType);
  if (data.byteLength === 0) fail('Webarchive main content is empty');

  return {
    mimeType: resolveMimeType(declaredMimeType, data),
    textEncoding:
      readString(main, WEBARCHIVE_KEYS.textEncoding)?.trim() ||
      DEFAULT_TEXT_ENCODING,
    data,
    url: readString(main, WEBARCHIVE_KEYS.url) ?? '',
  };
}
