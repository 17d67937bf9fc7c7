import type {
  ConversionErrorKind,
  ConversionStage,
} from '../errors/conversion-errors.js';
import type { DecodeOptions, PlistValue } from '../plist/types.js';
import type { RenderOptions } from '../transform/html-to-text.js';
import type { WebArchiveResource } from '../webarchive/types.js';

export interface ConversionOptions {
  maxBytes: number;
  stripBoilerplate: boolean;
}

export interface ConversionSuccess {
  ok: true;
  text: string;
  mimeType: string;
  url: string;
}

export interface ConversionFailure {
  ok: false;
  kind: ConversionErrorKind;
  stage: ConversionStage;
  detail: string;
}

export type ConversionResult = ConversionSuccess | ConversionFailure;

/** The three pipeline steps, replaceable for instrumentation. */
export interface ConversionStages {
  decode: (bytes: Uint8Array, options?: DecodeOptions) => PlistValue;
  extract: (root: PlistValue) => WebArchiveResource;
  render: (
    htmlBytes: Uint8Array,
    encodingHint: string | undefined,
    options?: RenderOptions
  ) => string;
}
