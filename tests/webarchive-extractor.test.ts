import { Buffer } from 'node:buffer';

import { describe, expect, it } from 'vitest';

import { FormatError } from '../src/errors/conversion-errors.js';
import { extractMainResource } from '../src/webarchive/extractor.js';
import {
  mainResourceDict,
  plistArray,
  plistData,
  plistDict,
  plistString,
  webArchiveTree,
} from './helpers/webarchive-fixtures.js';

function bytesOf(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'utf8'));
}

describe('extractMainResource', () => {
  it('returns the main document and its metadata', () => {
    const resource = extractMainResource(webArchiveTree('<p>Hi</p>'));

    expect(resource).toEqual({
      mimeType: 'text/html',
      textEncoding: 'UTF-8',
      data: bytesOf('<p>Hi</p>'),
      url: 'https://example.test/page',
    });
  });

  it('reads archives written with the legacy MainResource key', () => {
    const root = plistDict({
      MainResource: mainResourceDict({
        data: plistData('<p>Old</p>'),
        mimeType: 'text/html',
      }),
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('<p>Old</p>'));
  });

  it('prefers WebMainResource over the legacy key', () => {
    const root = plistDict({
      MainResource: mainResourceDict({ data: plistData('<p>Old</p>') }),
      WebMainResource: mainResourceDict({ data: plistData('<p>New</p>') }),
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('<p>New</p>'));
  });

  it('ignores subresources entirely', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistData('<p>Main</p>'),
        mimeType: 'text/html',
      }),
      WebSubresources: plistString('not even an array'),
      WebSubframeArchives: { kind: 'integer', value: 12n },
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('<p>Main</p>'));
  });

  it('normalizes the MIME type', () => {
    const resource = extractMainResource(
      webArchiveTree('<p>Hi</p>', { mimeType: '  TEXT/HTML ' })
    );

    expect(resource.mimeType).toBe('text/html');
  });

  it('defaults the encoding and URL when absent', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistData('<p>Hi</p>'),
        mimeType: 'text/html',
      }),
    });

    const resource = extractMainResource(root);

    expect(resource.textEncoding).toBe('UTF-8');
    expect(resource.url).toBe('');
  });

  it('assumes HTML when the MIME type is missing and the payload is markup', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({ data: plistData('\n  <html></html>') }),
    });

    expect(extractMainResource(root).mimeType).toBe('text/html');
  });

  it('rejects an untyped payload that is not markup', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistData(new Uint8Array([0x00, 0xff, 0x10])),
      }),
    });

    expect(() => extractMainResource(root)).toThrow(
      'Main resource has no MIME type and does not look like HTML'
    );
  });

  it('accepts the document stored as a string', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistString('<p>Grüße</p>'),
        mimeType: 'text/html',
      }),
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('<p>Grüße</p>'));
  });

  it('decodes a base64 payload stored as data', () => {
    const encoded = Buffer.from('<p>Encoded</p>').toString('base64');
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistData(encoded),
        mimeType: 'text/html',
      }),
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('<p>Encoded</p>'));
  });

  it('decodes a base64 payload stored as a wrapped string', () => {
    const encoded = Buffer.from('<p>Wrapped payload text</p>').toString('base64');
    const wrapped = `${encoded.slice(0, 16)}\n${encoded.slice(16)}`;
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistString(wrapped),
        mimeType: 'text/html',
      }),
    });

    expect(extractMainResource(root).data).toEqual(
      bytesOf('<p>Wrapped payload text</p>')
    );
  });

  it('keeps plain text that only resembles base64 in length', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistData('Just text'),
        mimeType: 'text/plain',
      }),
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('Just text'));
  });

  it.each(['Test', 'Done', 'TODO'])(
    'keeps the one-word text payload %s as written',
    (word) => {
      const root = plistDict({
        WebMainResource: mainResourceDict({
          data: plistData(word),
          mimeType: 'text/plain',
        }),
      });

      expect(extractMainResource(root).data).toEqual(bytesOf(word));
    }
  );

  it('keeps base64-shaped html whose decoding is not markup', () => {
    const root = plistDict({
      WebMainResource: mainResourceDict({
        data: plistString('Done'),
        mimeType: 'text/html',
      }),
    });

    expect(extractMainResource(root).data).toEqual(bytesOf('Done'));
  });

  it('decodes base64 markup when no MIME type is declared', () => {
    const encoded = Buffer.from('<p>Untyped</p>').toString('base64');
    const root = plistDict({
      WebMainResource: mainResourceDict({ data: plistData(encoded) }),
    });

    const resource = extractMainResource(root);

    expect(resource.data).toEqual(bytesOf('<p>Untyped</p>'));
    expect(resource.mimeType).toBe('text/html');
  });

  describe('malformed archives', () => {
    it.each([
      ['an array root', plistArray([]), 'Archive root is a array, expected a dictionary'],
      ['a root without a main resource', plistDict({}), 'Webarchive missing main content'],
      [
        'a main resource that is not a dictionary',
        plistDict({ WebMainResource: plistString('nope') }),
        'Main resource is a string, expected a dictionary',
      ],
      [
        'a main resource without data',
        plistDict({ WebMainResource: mainResourceDict({ mimeType: 'text/html' }) }),
        'Webarchive missing main content',
      ],
      [
        'an integer payload',
        plistDict({
          WebMainResource: mainResourceDict({ data: { kind: 'integer', value: 1n } }),
        }),
        'Main resource data is a integer, expected data',
      ],
      [
        'an empty payload',
        plistDict({
          WebMainResource: mainResourceDict({
            data: plistData(new Uint8Array(0)),
            mimeType: 'text/html',
          }),
        }),
        'Webarchive main content is empty',
      ],
    ])('rejects %s', (_label, root, message) => {
      try {
        extractMainResource(root);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FormatError);
        if (!(error instanceof FormatError)) return;
        expect(error.message).toBe(message);
        expect(error.stage).toBe('webarchive');
      }
    });
  });
});
