import { Buffer } from 'node:buffer';

import type { PlistValue } from '../../src/plist/types.js';
import { encodeBinaryPlist } from './bplist-writer.js';

export function plistString(value: string): PlistValue {
  return { kind: 'string', value };
}

export function plistData(value: string | Uint8Array): PlistValue {
  return {
    kind: 'data',
    value:
      typeof value === 'string' ? new Uint8Array(Buffer.from(value, 'utf8')) : value,
  };
}

export function plistDict(entries: Record<string, PlistValue>): PlistValue {
  return { kind: 'dict', value: new Map(Object.entries(entries)) };
}

export function plistArray(values: PlistValue[]): PlistValue {
  return { kind: 'array', value: values };
}

export interface MainResourceFixture {
  data?: PlistValue;
  mimeType?: string;
  textEncoding?: string;
  url?: string;
}

export function mainResourceDict(fixture: MainResourceFixture): PlistValue {
  const entries: Record<string, PlistValue> = {};
  if (fixture.data) entries['WebResourceData'] = fixture.data;
  if (fixture.mimeType !== undefined) {
    entries['WebResourceMIMEType'] = plistString(fixture.mimeType);
  }
  if (fixture.textEncoding !== undefined) {
    entries['WebResourceTextEncodingName'] = plistString(fixture.textEncoding);
  }
  if (fixture.url !== undefined) {
    entries['WebResourceURL'] = plistString(fixture.url);
  }
  return plistDict(entries);
}

/** Webarchive plist tree with an HTML main resource and one image subresource. */
export function webArchiveTree(
  html: string | Uint8Array,
  overrides: Omit<MainResourceFixture, 'data'> = {}
): PlistValue {
  return plistDict({
    WebMainResource: mainResourceDict({
      data: plistData(html),
      mimeType: 'text/html',
      textEncoding: 'UTF-8',
      url: 'https://example.test/page',
      ...overrides,
    }),
    WebSubresources: plistArray([
      mainResourceDict({
        data: plistData(new Uint8Array([0x89, 0x50, 0x4e, 0x47])),
        mimeType: 'image/png',
        url: 'https://example.test/logo.png',
      }),
    ]),
  });
}

export function buildWebArchive(
  html: string | Uint8Array,
  overrides: Omit<MainResourceFixture, 'data'> = {}
): Uint8Array {
  return encodeBinaryPlist(webArchiveTree(html, overrides));
}
