export type PlistDict = ReadonlyMap<string, PlistValue>;

export type PlistValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'real'; readonly value: number }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'data'; readonly value: Uint8Array }
  | { readonly kind: 'uid'; readonly value: bigint }
  | { readonly kind: 'array'; readonly value: readonly PlistValue[] }
  | { readonly kind: 'dict'; readonly value: PlistDict };

export type PlistKind = PlistValue['kind'];

export type PlistValueOf<K extends PlistKind> = Extract<PlistValue, { kind: K }>;

export function isPlistKind<K extends PlistKind>(
  value: PlistValue | undefined,
  kind: K
): value is PlistValueOf<K> {
  return value?.kind === kind;
}

export interface DecodeOptions {
  /** Nesting ceiling for containers; deeper input is rejected. */
  maxDepth?: number;
}
