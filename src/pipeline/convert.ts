import {
  type ConversionError,
  FormatError,
  isConversionError,
  SizeLimitError,
} from '../errors/conversion-errors.js';
import { decodeBinaryPlist } from '../plist/binary-plist.js';
import { renderHtmlToText } from '../transform/html-to-text.js';
import { isValidUtf8 } from '../transform/text-decoding.js';
import { extractMainResource } from '../webarchive/extractor.js';
import type { WebArchiveResource } from '../webarchive/types.js';
import type {
  ConversionFailure,
  ConversionOptions,
  ConversionResult,
  ConversionStages,
} from './types.js';

const HTML_MIME_TYPES: ReadonlySet<string> = new Set([
  'text/html',
  'application/xhtml+xml',
]);

export const defaultStages: ConversionStages = {
  decode: decodeBinaryPlist,
  extract: extractMainResource,
  render: renderHtmlToText,
};

export function toFailure(error: ConversionError): ConversionFailure {
  return {
    ok: false,
    kind: error.kind,
    stage: error.stage,
    detail: error.message,
  };
}

function essence(mimeType: string): string {
  return (mimeType.split(';')[0] ?? '').trim().toLowerCase();
}

function renderResource(
  resource: WebArchiveResource,
  options: ConversionOptions,
  stages: ConversionStages
): string {
  if (HTML_MIME_TYPES.has(essence(resource.mimeType))) {
    return stages.render(resource.data, resource.textEncoding, {
      stripBoilerplate: options.stripBoilerplate,
    });
  }

  // Non-HTML main resources are passed through only when they are UTF-8.
  if (!isValidUtf8(resource.data)) {
    throw new FormatError(
      `Unsupported main resource type ${resource.mimeType}`,
      'webarchive'
    );
  }
  return new TextDecoder('utf-8', { ignoreBOM: true }).decode(resource.data);
}

/**
 * Converts webarchive bytes into plain text.
 *
 * Input above `options.maxBytes` is rejected before any parsing. Conversion
 * errors become a failure result; anything else is a bug and propagates.
 */
export function convertWebArchive(
  rawBytes: Uint8Array,
  options: ConversionOptions,
  stages: ConversionStages = defaultStages
): ConversionResult {
  if (rawBytes.byteLength > options.maxBytes) {
    return toFailure(new SizeLimitError(options.maxBytes, rawBytes.byteLength));
  }

  try {
    const root = stages.decode(rawBytes);
    const resource = stages.extract(root);
    const text = renderResource(resource, options, stages);
    return { ok: true, text, mimeType: resource.mimeType, url: resource.url };
  } catch (error) {
    if (isConversionError(error)) return toFailure(error);
    throw error;
  }
}
